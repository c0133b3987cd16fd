import { DataSource, EntityTarget, ObjectLiteral } from 'typeorm';
import { KeyedMutex } from '../lib/keyedMutex';
import { Clock, formatDateStamp, formatTimeStamp, systemClock } from '../lib/dates';
import { ConflictError, ValidationError } from '../lib/errors';

export interface IdFormat {
  prefix: string;
  // second-level buckets for high-frequency kinds, daily buckets otherwise
  withTime: boolean;
  width: number;
}

export const ID_FORMATS = {
  patient: { prefix: 'P', withTime: false, width: 4 },
  visit: { prefix: 'V', withTime: true, width: 3 },
  admission: { prefix: 'IPD', withTime: false, width: 4 },
  employee: { prefix: 'EMP', withTime: false, width: 4 }
} as const satisfies Record<string, IdFormat>;

export const ID_PREFIXES = {
  bed: 'BED',
  charge: 'CHG',
  doctor: 'D',
  log: 'LOG',
  ot: 'OT',
  payment: 'PAY',
  salary: 'SAL',
  slip: 'SLIP'
} as const;

const GENERIC_WIDTH = 3;
const PREFIX_PATTERN = /^[A-Z]{1,5}$/;

/**
 * Returns the highest sequence number already issued for a bucket
 * (0 when the bucket is fresh).
 */
export type SequenceSeed = (bucket: string, width: number) => Promise<number>;

export interface IdGeneratorOptions {
  clock?: Clock;
  seed?: SequenceSeed;
}

/**
 * Issues date-embedded identifiers: prefix + YYYYMMDD[HHMMSS] + zero-padded sequence.
 *
 * All issuance for one prefix runs inside a single critical section, and the
 * clock is read inside it, so every bucket's sequence is gap-free and no value
 * is handed out twice however many callers race for it.
 */
export class IdGenerator {
  private readonly counters = new Map<string, number>();
  private readonly latestStamp = new Map<string, string>();
  private readonly mutex = new KeyedMutex();
  private readonly clock: Clock;
  private readonly seed: SequenceSeed;

  constructor(options: IdGeneratorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.seed = options.seed ?? (async () => 0);
  }

  generatePatientId(): Promise<string> {
    return this.issue(ID_FORMATS.patient);
  }

  generateVisitId(): Promise<string> {
    return this.issue(ID_FORMATS.visit);
  }

  generateAdmissionId(): Promise<string> {
    return this.issue(ID_FORMATS.admission);
  }

  generateEmployeeId(): Promise<string> {
    return this.issue(ID_FORMATS.employee);
  }

  /** Generic ids for charges, payments, logs and the like */
  async generateId(prefix: string): Promise<string> {
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new ValidationError(`Invalid id prefix: ${prefix}`);
    }
    return this.issue({ prefix, withTime: true, width: GENERIC_WIDTH });
  }

  private issue(format: IdFormat): Promise<string> {
    const lane = `${format.prefix}:${format.withTime ? 'time' : 'date'}`;
    return this.mutex.runExclusive(lane, async () => {
      const now = this.clock();
      const stamp = format.withTime
        ? `${formatDateStamp(now)}${formatTimeStamp(now)}`
        : formatDateStamp(now);
      const bucket = `${format.prefix}${stamp}`;

      let current = this.counters.get(bucket);
      if (current === undefined) {
        current = await this.seed(bucket, format.width);
        this.retire(lane, format.prefix, stamp);
      }
      const next = current + 1;
      if (next >= 10 ** format.width) {
        throw new ConflictError(`Id sequence ${bucket} is exhausted`);
      }
      this.counters.set(bucket, next);
      return `${bucket}${String(next).padStart(format.width, '0')}`;
    });
  }

  // Once the clock has moved past a bucket it can never be issued from again
  private retire(lane: string, prefix: string, stamp: string) {
    const previous = this.latestStamp.get(lane);
    if (previous !== undefined && previous < stamp) {
      this.counters.delete(`${prefix}${previous}`);
    }
    if (previous === undefined || previous < stamp) {
      this.latestStamp.set(lane, stamp);
    }
  }
}

/**
 * Seeds buckets from the store: the highest id already persisted under the
 * bucket, so a restarted process continues the day's sequence.
 */
export const createStoreSequenceSeed = (
  dataSource: DataSource,
  tables: Record<string, EntityTarget<ObjectLiteral>>
): SequenceSeed => {
  return async (bucket, width) => {
    const prefix = /^[A-Z]+/.exec(bucket)?.[0];
    const target = prefix === undefined ? undefined : tables[prefix];
    if (target === undefined) {
      return 0;
    }
    const row = await dataSource
      .getRepository(target)
      .createQueryBuilder('row')
      .select('MAX(row.id)', 'maxId')
      .where('row.id LIKE :pattern', { pattern: `${bucket}%` })
      .andWhere('LENGTH(row.id) = :length', { length: bucket.length + width })
      .getRawOne<{ maxId: string | null }>();
    const maxId = row?.maxId;
    return maxId ? Number(maxId.slice(bucket.length)) : 0;
  };
};
