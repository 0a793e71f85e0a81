import { lookup } from 'node:dns/promises';
import { isIP, isIPv4 } from 'node:net';
import { createLogger, describeError } from '../logging/logger.js';
import { detectDefaultGateway } from './gateway.js';
import { probeReachable } from './probe.js';

const log = createLogger('keepalive');

export const GATEWAY_KEYWORD = 'gateway';
export const FALLBACK_PRIVATE_GATEWAY = '192.168.1.1';
// Leaves the local network. Integrators can switch it off with allowPublicFallback.
export const PUBLIC_LAST_RESORT = '8.8.8.8';
export const PROBE_BUDGET_MS = 500;

export interface ResolverDeps {
  lookupHost: (host: string) => Promise<string>;
  detectGateway: () => Promise<string | null>;
  probe: (address: string, timeoutMs: number) => Promise<boolean>;
}

export interface ResolveOptions {
  allowPublicFallback?: boolean;
}

export interface TargetStrategy {
  name: string;
  resolve: () => Promise<string | null>;
}

export const defaultResolverDeps: ResolverDeps = {
  lookupHost: async (host) => (await lookup(host, { family: 4 })).address,
  detectGateway: () => detectDefaultGateway(),
  probe: probeReachable
};

export function isGatewayKeyword(configValue: string | undefined): boolean {
  const v = configValue?.trim() ?? '';
  return v === '' || v.toLowerCase() === GATEWAY_KEYWORD;
}

/**
 * Ordered resolution chain: explicit host, routing-table gateway, a probed
 * private default, then the public last resort.
 */
export function buildTargetStrategies(configValue: string | undefined, deps: ResolverDeps, opts: ResolveOptions = {}): TargetStrategy[] {
  const strategies: TargetStrategy[] = [];

  if (!isGatewayKeyword(configValue)) {
    const host = (configValue ?? '').trim();
    strategies.push({
      name: `host ${host}`,
      resolve: async () => {
        if (isIPv4(host)) return host;
        // The keepalive socket is udp4.
        if (isIP(host)) throw new Error('not an IPv4 address');
        return deps.lookupHost(host);
      }
    });
  }

  strategies.push({ name: 'default gateway', resolve: deps.detectGateway });

  strategies.push({
    name: `probe ${FALLBACK_PRIVATE_GATEWAY}`,
    resolve: async () => ((await deps.probe(FALLBACK_PRIVATE_GATEWAY, PROBE_BUDGET_MS)) ? FALLBACK_PRIVATE_GATEWAY : null)
  });

  if (opts.allowPublicFallback ?? true) {
    strategies.push({ name: 'public last resort', resolve: async () => PUBLIC_LAST_RESORT });
  }

  return strategies;
}

/** Never rejects; null means the keepalive cannot start. */
export async function resolveTarget(configValue: string | undefined, deps: ResolverDeps = defaultResolverDeps, opts: ResolveOptions = {}): Promise<string | null> {
  for (const strategy of buildTargetStrategies(configValue, deps, opts)) {
    try {
      const address = await strategy.resolve();
      if (address) {
        log.info(`keepalive target ${address} (${strategy.name})`);
        return address;
      }
      log.debug(`${strategy.name}: no address`);
    } catch (error) {
      log.warn(`${strategy.name} failed: ${describeError(error)}`);
    }
  }
  log.error('failed to resolve any keepalive target');
  return null;
}
