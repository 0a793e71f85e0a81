import { execFile } from 'node:child_process';
import { isIPv4 } from 'node:net';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('gateway');

const COMMAND_TIMEOUT_MS = 1_500;

export type CommandRunner = (file: string, args: string[]) => Promise<string>;

export interface RouteCommand {
  file: string;
  args: string[];
  parse: (stdout: string) => string | null;
}

const firstIPv4 = (candidate: string | undefined): string | null => (candidate && isIPv4(candidate) ? candidate : null);

/** `route -n get default` (macOS / BSD). */
export function parseRouteGetDefault(stdout: string): string | null {
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('gateway:')) return firstIPv4(trimmed.slice('gateway:'.length).trim());
  }
  return null;
}

/** `ip route show default` (Linux). */
export function parseIpRouteDefault(stdout: string): string | null {
  const match = /^default via (\S+)/m.exec(stdout);
  return firstIPv4(match?.[1]);
}

/** `route print 0.0.0.0` (Windows); on-link rows carry no gateway. */
export function parseRoutePrint(stdout: string): string | null {
  for (const line of stdout.split('\n')) {
    const cols = line.trim().split(/\s+/);
    if (cols[0] === '0.0.0.0' && cols[1] === '0.0.0.0') {
      const gw = firstIPv4(cols[2]);
      if (gw) return gw;
    }
  }
  return null;
}

/** `netstat -rn`, any flavour that prints a `default` or `0.0.0.0` destination row. */
export function parseNetstatRoutes(stdout: string): string | null {
  for (const line of stdout.split('\n')) {
    const cols = line.trim().split(/\s+/);
    if (cols[0] === 'default' || cols[0] === '0.0.0.0') {
      const gw = firstIPv4(cols[1]);
      if (gw) return gw;
    }
  }
  return null;
}

export function routeCommandsFor(platform: NodeJS.Platform): RouteCommand[] {
  const netstat: RouteCommand = { file: 'netstat', args: ['-rn'], parse: parseNetstatRoutes };
  switch (platform) {
    case 'darwin':
    case 'freebsd':
    case 'openbsd':
      return [{ file: 'route', args: ['-n', 'get', 'default'], parse: parseRouteGetDefault }, netstat];
    case 'linux':
      return [{ file: 'ip', args: ['route', 'show', 'default'], parse: parseIpRouteDefault }, netstat];
    case 'win32':
      return [{ file: 'route', args: ['print', '0.0.0.0'], parse: parseRoutePrint }];
    default:
      return [netstat];
  }
}

export const runCommand: CommandRunner = (file, args) => new Promise((resolve, reject) => {
  execFile(file, args, { timeout: COMMAND_TIMEOUT_MS, windowsHide: true }, (error, stdout) => {
    if (error) return reject(error);
    resolve(stdout);
  });
});

/**
 * Reads the default route's gateway from the OS routing table. Tries each
 * platform command in order and returns null when none yields an IPv4 gateway.
 */
export async function detectDefaultGateway(run: CommandRunner = runCommand, platform: NodeJS.Platform = process.platform): Promise<string | null> {
  for (const cmd of routeCommandsFor(platform)) {
    try {
      const gateway = cmd.parse(await run(cmd.file, cmd.args));
      if (gateway) {
        log.info(`detected default gateway ${gateway} via ${cmd.file}`);
        return gateway;
      }
    } catch (error) {
      log.warn(`${cmd.file} ${cmd.args.join(' ')} failed: ${describeError(error)}`);
    }
  }
  return null;
}
