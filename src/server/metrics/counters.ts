type CodeCounter = Record<string, number>;

export class Counters {
  wsCloseTotal: CodeCounter = {};
  adapterConnectionsTotal = 0;
  ticksReceivedTotal = 0;
  gameStateChangesTotal = 0;
  rejectedMessagesTotal = 0;

  markWsClose(code: number): void {
    const k = String(code);
    this.wsCloseTotal[k] = (this.wsCloseTotal[k] ?? 0) + 1;
  }
}
