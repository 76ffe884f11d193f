import logger from '../utils/logger';
import type { MedicalRecordRepository } from '../repositories/medicalRecord.repository';
import type { MedicalRecord, MedicalRecordInput } from '../types/models';

export class MedicalRecordService {
  constructor(private readonly medicalRecords: MedicalRecordRepository) {}

  getAllMedicalRecords(): MedicalRecord[] {
    return this.medicalRecords.findAll();
  }

  getMedicalRecord(firstName: string, lastName: string): MedicalRecord | undefined {
    return this.medicalRecords.findByFirstNameAndLastName(firstName, lastName);
  }

  addMedicalRecord(record: MedicalRecordInput): Promise<MedicalRecord> {
    return this.medicalRecords.insert(record);
  }

  /**
   * Replace birthdate and lists of an existing record. An omitted birthdate is
   * kept; omitted lists become empty.
   */
  async updateMedicalRecord(update: MedicalRecordInput): Promise<MedicalRecord | undefined> {
    const updated = await this.medicalRecords.update(update);
    if (!updated) {
      logger.warn('Medical record not found for update', { firstName: update.firstName, lastName: update.lastName });
    }
    return updated;
  }

  deleteMedicalRecord(firstName: string, lastName: string): Promise<boolean> {
    return this.medicalRecords.deleteByFirstNameAndLastName(firstName, lastName);
  }
}
