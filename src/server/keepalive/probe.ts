import net from 'node:net';

/** TCP echo, the port a reachability check falls back to when ICMP is unavailable. */
const ECHO_PORT = 7;

/**
 * Resolves true when the host answers a TCP connect within the budget. A
 * refused connection still proves the host is up.
 */
export function probeReachable(address: string, timeoutMs: number, port = ECHO_PORT): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host: address, port });
    const timer = setTimeout(() => finish(false), timeoutMs);

    function finish(reachable: boolean): void {
      clearTimeout(timer);
      socket.destroy();
      resolve(reachable);
    }

    socket.once('connect', () => finish(true));
    socket.once('error', (error: NodeJS.ErrnoException) => finish(error.code === 'ECONNREFUSED'));
  });
}
