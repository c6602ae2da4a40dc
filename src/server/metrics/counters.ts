type CodeCounter = Record<string, number>;

export class Counters {
  wsCloseTotal: CodeCounter = {};
  messagesReceivedTotal = 0;
  binaryFramesTotal = 0;
  protocolErrorTotal = 0;
  handlerErrorTotal = 0;
  throttleInterruptTotal = 0;
  sendFailureTotal = 0;
  heartbeatTotal = 0;
  clientConflictTotal = 0;

  markWsClose(code: number): void {
    const k = String(code);
    this.wsCloseTotal[k] = (this.wsCloseTotal[k] ?? 0) + 1;
  }
}
