import { Inject, Injectable } from '@nestjs/common';
import { appendFileSync, readFileSync } from 'node:fs';
import ledgerConfig, { LedgerConfig } from '../config/ledger.config';
import { PersistenceError } from './errors/ledger.errors';
import { isMissingFile } from './inventory.repository';

/** Append-only activity log file, one entry per line. */
@Injectable()
export class HistoryRepository {
  constructor(@Inject(ledgerConfig.KEY) private readonly config: LedgerConfig) {}

  readLines(): string[] {
    let text: string;
    try {
      text = readFileSync(this.config.historyFile, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new PersistenceError(this.config.historyFile, 'read', error);
    }
    return text.split(/\r?\n/).filter((line) => line.length > 0);
  }

  appendLine(line: string): void {
    try {
      appendFileSync(this.config.historyFile, `${line}\n`, 'utf8');
    } catch (error) {
      throw new PersistenceError(this.config.historyFile, 'append to', error);
    }
  }
}
