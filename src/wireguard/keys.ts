/**
 * WireGuard Key Generation
 *
 * Keys come from an injected KeyGenerator so that nothing here implements
 * cryptography. CommandKeyGenerator shells out to `wg`.
 */

import { ExternalCommandError, ValidationError } from '../core/errors.js';
import { runChecked, type CommandRunner } from '../system/executor.js';

/**
 * Key-generation capability.
 */
export interface KeyGenerator {
  generatePrivateKey(): Promise<string>;
  derivePublicKey(privateKey: string): Promise<string>;
  generatePresharedKey(): Promise<string>;
}

/**
 * A key pair.
 */
export interface KeyPair {
  privateKey: string;
  publicKey: string;
}

const KEY_PATTERN = /^[A-Za-z0-9+/]{43}=$/;

/**
 * Whether `key` is a base64-encoded 32-byte WireGuard key.
 */
export function isValidKey(key: string): boolean {
  if (!KEY_PATTERN.test(key)) {
    return false;
  }
  return Buffer.from(key, 'base64').length === 32;
}

/**
 * @throws ValidationError naming `field` if the key is malformed
 */
export function assertValidKey(key: string, field: string): void {
  if (!isValidKey(key)) {
    throw new ValidationError(
      `Invalid ${field}: expected 44 characters of base64 encoding 32 bytes`,
      field
    );
  }
}

/**
 * Generate a private key and derive its public key.
 */
export async function generateKeyPair(keygen: KeyGenerator): Promise<KeyPair> {
  const privateKey = await keygen.generatePrivateKey();
  const publicKey = await keygen.derivePublicKey(privateKey);
  return { privateKey, publicKey };
}

/**
 * KeyGenerator backed by the wg(8) tool.
 */
export class CommandKeyGenerator implements KeyGenerator {
  constructor(
    private readonly runner: CommandRunner,
    private readonly wgPath: string = 'wg'
  ) {}

  async generatePrivateKey(): Promise<string> {
    return this.runKeyCommand(['genkey']);
  }

  async derivePublicKey(privateKey: string): Promise<string> {
    return this.runKeyCommand(['pubkey'], `${privateKey}\n`);
  }

  async generatePresharedKey(): Promise<string> {
    return this.runKeyCommand(['genpsk']);
  }

  private async runKeyCommand(args: string[], input?: string): Promise<string> {
    const result = await runChecked(this.runner, this.wgPath, args, { input });
    const key = result.stdout.trim();
    if (!isValidKey(key)) {
      throw new ExternalCommandError(
        `${this.wgPath} ${args.join(' ')} returned malformed key output`,
        this.wgPath,
        args,
        result.exitCode,
        result.stdout,
        result.stderr
      );
    }
    return key;
  }
}
