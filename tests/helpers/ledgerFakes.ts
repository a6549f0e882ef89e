import { ApiError } from '../../src/middlewares/errorHandler';
import { EscrowLedger, LedgerDefaults } from '../../src/services/escrow/escrow.ledger';
import type {
  Clock,
  EscrowEventSink,
  EscrowRecord,
  Identity,
  LedgerRepository,
  LedgerSettingsState,
  LedgerSnapshot,
  SendPurpose,
  ValueCustody,
} from '../../src/services/escrow/escrow.types';
import type { EscrowEvent } from '../../src/types/events';

export const NOW = 1_700_000_000;
export const ADMIN = 'user_admin';
export const ALICE = 'user_alice';
export const BOB = 'user_bob';
export const CAROL = 'user_carol';

export class ManualClock implements Clock {
  constructor(public current = NOW) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export interface SendRecord {
  to: Identity;
  amount: bigint;
  purpose: SendPurpose;
}

/**
 * Custody with plain in-memory balances
 */
export class FakeCustody implements ValueCustody {
  readonly balances = new Map<Identity, bigint>();
  readonly failingRecipients = new Set<Identity>();
  readonly sends: SendRecord[] = [];
  readonly reversals: Array<{ from: Identity; amount: bigint; reference: string }> = [];
  onSend: ((to: Identity, amount: bigint, purpose: SendPurpose) => Promise<void>) | null = null;
  private references = 0;

  fund(identity: Identity, amount: bigint): void {
    this.balances.set(identity, this.balanceOf(identity) + amount);
  }

  balanceOf(identity: Identity): bigint {
    return this.balances.get(identity) ?? 0n;
  }

  async receive(from: Identity, amount: bigint): Promise<string> {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw ApiError.insufficientBalance();
    }
    this.balances.set(from, balance - amount);
    this.references += 1;
    return `deposit-${this.references}`;
  }

  async reverse(from: Identity, amount: bigint, reference: string): Promise<void> {
    this.reversals.push({ from, amount, reference });
    this.fund(from, amount);
  }

  async send(to: Identity, amount: bigint, purpose: SendPurpose): Promise<void> {
    if (this.onSend) {
      await this.onSend(to, amount, purpose);
    }
    if (this.failingRecipients.has(to)) {
      throw new Error(`recipient ${to} rejected the transfer`);
    }
    this.fund(to, amount);
    this.sends.push({ to, amount, purpose });
  }
}

type RepositoryMethod = 'saveSettings' | 'saveRecord';

export class InMemoryLedgerRepository implements LedgerRepository {
  settings: LedgerSettingsState | null = null;
  readonly records = new Map<number, EscrowRecord>();
  private failures: RepositoryMethod[] = [];

  /**
   * Make the next call to `method` throw
   */
  failNext(method: RepositoryMethod): void {
    this.failures.push(method);
  }

  private maybeFail(method: RepositoryMethod): void {
    const index = this.failures.indexOf(method);
    if (index >= 0) {
      this.failures.splice(index, 1);
      throw new Error(`${method} failed: disk full`);
    }
  }

  async load(): Promise<LedgerSnapshot | null> {
    if (!this.settings) {
      return null;
    }
    return {
      settings: { ...this.settings },
      records: Array.from(this.records.values()).map((record) => ({ ...record })),
    };
  }

  async saveSettings(settings: LedgerSettingsState): Promise<void> {
    this.maybeFail('saveSettings');
    this.settings = { ...settings };
  }

  async saveRecord(record: EscrowRecord): Promise<void> {
    this.maybeFail('saveRecord');
    this.records.set(record.recordId, { ...record });
  }
}

export class RecordingSink implements EscrowEventSink {
  readonly events: EscrowEvent[] = [];
  failing = false;

  async publish(event: EscrowEvent): Promise<void> {
    if (this.failing) {
      throw new Error('event bus not connected');
    }
    this.events.push(event);
  }
}

export interface LedgerFixture {
  ledger: EscrowLedger;
  repository: InMemoryLedgerRepository;
  custody: FakeCustody;
  clock: ManualClock;
  sink: RecordingSink;
}

export const defaultLedgerSettings = (overrides: Partial<LedgerDefaults> = {}): LedgerDefaults => ({
  administrator: ADMIN,
  feeBasisPoints: 42,
  feePolicy: 'STORE_AND_CLAIM',
  ...overrides,
});

export const openLedger = async (
  overrides: Partial<LedgerDefaults> = {},
  repository = new InMemoryLedgerRepository()
): Promise<LedgerFixture> => {
  const custody = new FakeCustody();
  const clock = new ManualClock();
  const sink = new RecordingSink();
  const ledger = await EscrowLedger.open({
    repository,
    custody,
    clock,
    sink,
    defaults: defaultLedgerSettings(overrides),
  });
  return { ledger, repository, custody, clock, sink };
};
