import { EscrowRecordModel, IEscrowRecord } from '../../models/EscrowRecord';
import { LedgerSettings, LEDGER_SETTINGS_KEY } from '../../models/LedgerSettings';

import type {
  EscrowRecord,
  LedgerRepository,
  LedgerSettingsState,
  LedgerSnapshot,
} from './escrow.types';

export const toEscrowRecord = (doc: IEscrowRecord): EscrowRecord => ({
  recordId: doc.recordId,
  amount: BigInt(doc.amount),
  unlockTime: doc.unlockTime,
  claimed: doc.claimed,
  depositor: doc.depositor,
  beneficiary: doc.beneficiary,
});

/**
 * Ledger state in MongoDB: one settings document plus one document per
 * record. Writes are upserts so restoring a previous state is just a save.
 */
export class MongoLedgerRepository implements LedgerRepository {
  async load(): Promise<LedgerSnapshot | null> {
    const settings = await LedgerSettings.findOne({ key: LEDGER_SETTINGS_KEY });
    if (!settings) {
      return null;
    }

    const records = await EscrowRecordModel.find().sort({ recordId: 1 });

    return {
      settings: {
        nextRecordId: settings.nextRecordId,
        feeBasisPoints: settings.feeBasisPoints,
        collectedFees: BigInt(settings.collectedFees),
        administrator: settings.administrator,
        feePolicy: settings.feePolicy,
        eventSequence: settings.eventSequence,
      },
      records: records.map(toEscrowRecord),
    };
  }

  async saveSettings(settings: LedgerSettingsState): Promise<void> {
    await LedgerSettings.updateOne(
      { key: LEDGER_SETTINGS_KEY },
      {
        $set: {
          nextRecordId: settings.nextRecordId,
          feeBasisPoints: settings.feeBasisPoints,
          collectedFees: settings.collectedFees.toString(),
          administrator: settings.administrator,
          feePolicy: settings.feePolicy,
          eventSequence: settings.eventSequence,
        },
      },
      { upsert: true }
    );
  }

  async saveRecord(record: EscrowRecord): Promise<void> {
    await EscrowRecordModel.updateOne(
      { recordId: record.recordId },
      {
        $set: {
          amount: record.amount.toString(),
          unlockTime: record.unlockTime,
          claimed: record.claimed,
          depositor: record.depositor,
          beneficiary: record.beneficiary,
        },
      },
      { upsert: true }
    );
  }
}
