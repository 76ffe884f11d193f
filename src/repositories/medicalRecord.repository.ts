import logger from '../utils/logger';
import { AlreadyExistsError, InvalidInputError } from '../utils/errors';
import { matchesName, nameKey } from '../utils/keys';
import type { DataStore } from '../utils/datastore';
import type { MedicalRecord, MedicalRecordInput } from '../types/models';

const toStoredRecord = (input: MedicalRecordInput): MedicalRecord => ({
  firstName: input.firstName.trim(),
  lastName: input.lastName.trim(),
  birthdate: input.birthdate ?? '',
  medications: [...(input.medications ?? [])],
  allergies: [...(input.allergies ?? [])],
});

export class MedicalRecordRepository {
  constructor(private readonly store: DataStore) {}

  findAll(): MedicalRecord[] {
    return this.store.snapshot('medicalrecords').items;
  }

  findByFirstNameAndLastName(firstName: string | null | undefined, lastName: string | null | undefined): MedicalRecord | undefined {
    const key = nameKey(firstName, lastName);
    if (!key) {
      return undefined;
    }
    return this.findAll().find((record) => matchesName(record, key));
  }

  existsByFirstNameAndLastName(firstName: string | null | undefined, lastName: string | null | undefined): boolean {
    const key = nameKey(firstName, lastName);
    if (!key) {
      logger.debug('existsByFirstNameAndLastName: blank first or last name');
      return false;
    }
    return this.findAll().some((record) => matchesName(record, key));
  }

  /**
   * Insert or replace by identity. Missing medication and allergy lists are
   * stored as empty arrays.
   */
  async save(input: MedicalRecordInput): Promise<MedicalRecord> {
    const key = nameKey(input.firstName, input.lastName);
    if (!key) {
      throw new InvalidInputError('Medical record first name and last name must not be blank');
    }

    const stored = toStoredRecord(input);

    await this.store.update('medicalrecords', (records) => {
      const index = records.findIndex((existing) => matchesName(existing, key));
      if (index >= 0) {
        logger.debug('Replacing medical record', { firstName: stored.firstName, lastName: stored.lastName });
        records.splice(index, 1, stored);
      } else {
        records.push(stored);
      }
      return records;
    });

    logger.info('Medical record saved', { firstName: stored.firstName, lastName: stored.lastName });
    return structuredClone(stored);
  }

  /** Insert a record for an identity that has none yet. */
  async insert(input: MedicalRecordInput): Promise<MedicalRecord> {
    const key = nameKey(input.firstName, input.lastName);
    if (!key) {
      throw new InvalidInputError('Medical record first name and last name must not be blank');
    }

    const stored = toStoredRecord(input);
    await this.store.update('medicalrecords', (records) => {
      if (records.some((existing) => matchesName(existing, key))) {
        throw new AlreadyExistsError(`A medical record already exists for ${stored.firstName} ${stored.lastName}`);
      }
      return [...records, stored];
    });

    logger.info('Medical record created', { firstName: stored.firstName, lastName: stored.lastName });
    return structuredClone(stored);
  }

  /**
   * Replace birthdate and lists of the stored record. An omitted birthdate is
   * kept; omitted lists become empty. Resolves to `undefined` when there is no
   * record for that name.
   */
  async update(input: MedicalRecordInput): Promise<MedicalRecord | undefined> {
    const key = nameKey(input.firstName, input.lastName);
    if (!key) {
      return undefined;
    }

    const outcome: { record?: MedicalRecord } = {};
    await this.store.update('medicalrecords', (records) => {
      const index = records.findIndex((existing) => matchesName(existing, key));
      if (index < 0) {
        return null;
      }

      const current = records[index];
      const merged = toStoredRecord({
        firstName: current.firstName,
        lastName: current.lastName,
        birthdate: input.birthdate ?? current.birthdate,
        medications: input.medications,
        allergies: input.allergies,
      });
      records.splice(index, 1, merged);
      outcome.record = merged;
      return records;
    });

    return outcome.record ? structuredClone(outcome.record) : undefined;
  }

  async deleteByFirstNameAndLastName(firstName: string | null | undefined, lastName: string | null | undefined): Promise<boolean> {
    const key = nameKey(firstName, lastName);
    if (!key) {
      logger.debug('Delete requested with blank first or last name');
      return false;
    }

    const removed = await this.store.update('medicalrecords', (records) => {
      const remaining = records.filter((record) => !matchesName(record, key));
      return remaining.length === records.length ? null : remaining;
    });

    if (removed) {
      logger.info('Medical record deleted', { firstName, lastName });
    } else {
      logger.warn('Medical record not found for deletion', { firstName, lastName });
    }
    return removed;
  }
}
