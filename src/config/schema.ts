/**
 * JSON Schema for answers files.
 */

import type { SchemaObject } from 'ajv';

const absolutePath = { type: 'string', pattern: '^/' };

export const answersSchema: SchemaObject = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'homelab-setup answers',
  type: 'object',
  additionalProperties: false,
  properties: {
    user: {
      type: 'object',
      additionalProperties: false,
      properties: {
        name: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_-]{0,31}$' },
        timezone: { type: 'string', minLength: 1 },
      },
    },
    directories: {
      type: 'object',
      additionalProperties: false,
      properties: {
        base: absolutePath,
      },
    },
    nfs: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        server: { type: 'string', anyOf: [{ format: 'ipv4' }, { format: 'hostname' }] },
        export: absolutePath,
        mount_point: absolutePath,
      },
    },
    containers: {
      type: 'object',
      additionalProperties: false,
      properties: {
        runtime: { type: 'string', enum: ['docker', 'podman'] },
        services: {
          type: 'array',
          items: { type: 'string', enum: ['media', 'web', 'cloud'] },
          uniqueItems: true,
        },
      },
    },
    wireguard: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        config_dir: absolutePath,
        interface: { type: 'string', pattern: '^[A-Za-z0-9_=+.-]{1,15}$' },
        address: { type: 'string', pattern: '^\\d{1,3}(\\.\\d{1,3}){3}/\\d{1,2}$' },
        listen_port: { type: 'integer', minimum: 1, maximum: 65535 },
        endpoint: { type: 'string', minLength: 1 },
        peer_dns: { type: 'string', minLength: 1 },
        export_dir: absolutePath,
      },
    },
  },
};
