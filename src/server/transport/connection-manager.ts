import type { AdapterConnection } from '../api/types.js';

export class ConnectionManager {
  private readonly connections = new Map<string, AdapterConnection>();

  registerConnection(connId: string, client: string, version: string, now: number): AdapterConnection {
    const conn: AdapterConnection = { connId, client, version, connectedAt: now };
    this.connections.set(connId, conn);
    return conn;
  }

  unregisterConnection(connId: string): AdapterConnection | undefined {
    const conn = this.connections.get(connId);
    this.connections.delete(connId);
    return conn;
  }

  get(connId: string): AdapterConnection | undefined { return this.connections.get(connId); }
  list(): AdapterConnection[] { return [...this.connections.values()]; }
  size(): number { return this.connections.size; }
}
