/**
 * Two-phase audit records: opened once at the start of a run, closed once
 * with its result. A second open or close is a programming error.
 */

import {
  JournalStateError,
  type AnalysisSessionOutcome,
  type AnalysisSessionRecord,
  type KnowledgeExpiryReportRecord,
  type NewAnalysisSession,
  type NewReport,
  type ReportOutcome,
  type StructuredStore,
} from '@kexp/core';

type JournalState = 'new' | 'open' | 'closed';

interface JournalOperations<TOpen, TClose, TRecord> {
  open(input: TOpen): Promise<TRecord>;
  close(record: TRecord, outcome: TClose): Promise<TRecord>;
}

export class Journal<TOpen, TClose, TRecord> {
  private readonly name: string;
  private readonly operations: JournalOperations<TOpen, TClose, TRecord>;
  private state: JournalState = 'new';
  private record: TRecord | null = null;

  constructor(name: string, operations: JournalOperations<TOpen, TClose, TRecord>) {
    this.name = name;
    this.operations = operations;
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  async open(input: TOpen): Promise<TRecord> {
    if (this.state !== 'new') {
      throw new JournalStateError(`${this.name} journal already opened`);
    }
    const record = await this.operations.open(input);
    this.record = record;
    this.state = 'open';
    return record;
  }

  /**
   * The journal counts as closed even if the write fails, so it is never
   * written twice
   */
  async close(outcome: TClose): Promise<TRecord> {
    if (this.state === 'closed') {
      throw new JournalStateError(`${this.name} journal already closed`);
    }
    if (this.record === null) {
      throw new JournalStateError(`${this.name} journal was never opened`);
    }
    this.state = 'closed';
    return this.operations.close(this.record, outcome);
  }
}

export type SessionJournal = Journal<NewAnalysisSession, AnalysisSessionOutcome, AnalysisSessionRecord>;
export type ReportJournal = Journal<NewReport, ReportOutcome, KnowledgeExpiryReportRecord>;

export function createSessionJournal(store: StructuredStore): SessionJournal {
  return new Journal('Analysis session', {
    open: (input) => store.createAnalysisSession(input),
    close: (record, outcome) => store.completeAnalysisSession(record.sessionId, outcome),
  });
}

export function createReportJournal(store: StructuredStore): ReportJournal {
  return new Journal('Report', {
    open: (input) => store.createReport(input),
    close: (record, outcome) => store.completeReport(record.reportId, outcome),
  });
}
