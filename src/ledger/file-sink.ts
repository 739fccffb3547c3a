import type { BotState } from '../types/index.js';
import type { FileIo } from '../db/atomic-file.js';
import type { EquityLog, EquityPoint } from '../report/equity-log.js';
import type { LedgerSink } from './ledger.js';
import { saveState } from './state-store.js';

/** 상태 JSON(원자적 교체) + 에쿼티 CSV */
export class FileLedgerSink implements LedgerSink {
  private readonly stateFile: string;
  private readonly equity: EquityLog;
  private readonly io: FileIo | undefined;

  constructor(stateFile: string, equity: EquityLog, io?: FileIo) {
    this.stateFile = stateFile;
    this.equity = equity;
    this.io = io;
  }

  persist(state: Readonly<BotState>): void {
    saveState(this.stateFile, { ...state }, this.io);
  }

  recordEquity(point: EquityPoint): void {
    this.equity.append(point);
  }
}
