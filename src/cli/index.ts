#!/usr/bin/env node
import { InvalidArgumentError, program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { resetCommand } from './commands/reset.js';
import { validateCommand } from './commands/validate.js';
import { addPeerCommand } from './commands/wireguard.js';
import type { GlobalOptions } from './context.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('homelab-setup')
  .description('Step-by-step provisioning for an rpm-ostree homelab server')
  .version(packageJson.version)
  .option('--config <path>', 'Configuration file (default: ~/.homelab-setup.conf)')
  .option('--marker-dir <dir>', 'Completion marker directory (default: ~/.local/homelab-setup)')
  .option('--verbose', 'Print system commands before execution')
  .option('--json', 'Output as JSON');

/**
 * Merge the global options into command-level options.
 * Supports both positions:
 *   homelab-setup --json status    (parent parses --json)
 *   homelab-setup status --json    (subcommand parses --json)
 */
function withGlobalOpts<T extends GlobalOptions>(opts: T): T {
  const globalOpts = program.opts<GlobalOptions>();
  return {
    ...opts,
    config: opts.config ?? globalOpts.config,
    markerDir: opts.markerDir ?? globalOpts.markerDir,
    verbose: opts.verbose === true || globalOpts.verbose === true,
    json: opts.json === true || globalOpts.json === true,
  };
}

function parseSeconds(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a whole number of seconds.');
  }
  return Number.parseInt(value, 10);
}

program
  .command('run <target>')
  .description('Run a step (preflight, user, directory, wireguard, nfs, container, deployment), all, or quick')
  .option('--non-interactive', 'Answer every prompt with its default')
  .option('--answers <file>', 'YAML answers file stored before the steps run')
  .option('--skip-wireguard', 'Skip the optional WireGuard step when running all')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print system commands before execution')
  .action((target: string, opts: Parameters<typeof runCommand>[1]) => runCommand(target, withGlobalOpts(opts)));

program
  .command('status')
  .description('Show which steps are complete')
  .option('--json', 'Output as JSON')
  .action((opts: GlobalOptions) => statusCommand(withGlobalOpts(opts)));

program
  .command('reset')
  .description('Clear completion markers so steps run again')
  .option('-f, --force', 'Do not ask for confirmation')
  .option('--config-file', 'Also remove the configuration file')
  .option('--json', 'Output as JSON')
  .action((opts: Parameters<typeof resetCommand>[0]) => resetCommand(withGlobalOpts(opts)));

program
  .command('validate <file>')
  .description('Check an answers file without applying it')
  .option('--json', 'Output as JSON')
  .action((file: string, opts: GlobalOptions) => validateCommand(file, withGlobalOpts(opts)));

const wireguard = program.command('wireguard').description('Manage the WireGuard interface');

wireguard
  .command('add-peer')
  .description('Add a peer to the server configuration and export its client configuration')
  .option('--interface <name>', 'Interface name (default: stored or wg0)')
  .option('--name <name>', 'Peer name')
  .option('--endpoint <host:port>', 'Server endpoint clients connect to')
  .option('--dns <servers>', 'Comma-separated DNS servers for the client')
  .option('--client-allowed-ips <cidrs>', 'Comma-separated networks routed through the tunnel')
  .option('--route-all', 'Route all client traffic through the tunnel')
  .option('--no-route-all', 'Route only the VPN subnet through the tunnel')
  .option('--export-dir <dir>', 'Directory for the client configuration')
  .option('--keepalive <seconds>', 'Persistent keepalive (0 disables)', parseSeconds)
  .option('--no-psk', 'Do not use a preshared key')
  .option('--preshared-key <key>', 'Use this preshared key instead of generating one')
  .option('--non-interactive', 'Fail instead of prompting for missing values')
  .option('--no-qr', 'Do not print a QR code')
  .option('--no-restart', 'Do not offer to restart the interface')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print system commands before execution')
  .action((opts: Parameters<typeof addPeerCommand>[0]) => addPeerCommand(withGlobalOpts(opts)));

await program.parseAsync();
