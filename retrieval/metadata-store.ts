import { InvalidArgumentError } from './errors';
import { parseRecord } from './record-schema';
import { copyRecord, type IntentRecord } from './types';

/**
 * Append-only, ordered record list. Position i belongs to vector i of the
 * index it was built with.
 */
export class MetadataStore {
  private readonly records: IntentRecord[] = [];

  constructor(records: readonly unknown[] = []) {
    this.append(records);
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Validates every record before storing any of them.
   */
  append(records: readonly unknown[]): void {
    const validated = records.map((value, position) => {
      const parsed = parseRecord(value);
      if (!parsed.success) {
        throw new InvalidArgumentError(`Invalid record at position ${position}: ${parsed.error}`);
      }
      return freezeRecord(parsed.record);
    });
    this.records.push(...validated);
  }

  get(position: number): IntentRecord {
    const record = this.records[position];
    if (!record) {
      throw new InvalidArgumentError(`No record at position ${position}`);
    }
    return copyRecord(record);
  }

  toArray(): IntentRecord[] {
    return this.records.map(copyRecord);
  }
}

function freezeRecord(record: IntentRecord): IntentRecord {
  const responses = [...record.responses];
  Object.freeze(responses);
  return Object.freeze({ ...record, responses });
}
