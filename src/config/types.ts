/**
 * Answers File Types
 *
 * Shape of the YAML file that pre-seeds configuration for unattended runs.
 * Every section and field is optional.
 */

export interface UserAnswers {
  name?: string;
  timezone?: string;
}

export interface DirectoryAnswers {
  base?: string;
}

export interface NfsAnswers {
  enabled?: boolean;
  server?: string;
  export?: string;
  mount_point?: string;
}

export interface ContainerAnswers {
  runtime?: 'docker' | 'podman';
  services?: string[];
}

export interface WireGuardAnswers {
  enabled?: boolean;
  config_dir?: string;
  interface?: string;
  address?: string;
  listen_port?: number;
  endpoint?: string;
  peer_dns?: string;
  export_dir?: string;
}

/**
 * Root of an answers file
 */
export interface AnswersFile {
  user?: UserAnswers;
  directories?: DirectoryAnswers;
  nfs?: NfsAnswers;
  containers?: ContainerAnswers;
  wireguard?: WireGuardAnswers;
}
