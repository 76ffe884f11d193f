import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createContext } from '../context';
import { AlreadyExistsError } from '../utils/errors';
import { fixedClock, openTempStore, sampleDocument } from '../test/fixtures';
import type { TempStore } from '../test/fixtures';
import type { MedicalRecordService } from './medicalRecord.service';

describe('MedicalRecordService', () => {
  let temp: TempStore;
  let service: MedicalRecordService;

  beforeEach(async () => {
    temp = await openTempStore(sampleDocument());
    service = createContext(temp.store, { childAgeThreshold: 18, clock: fixedClock }).services.medicalRecords;
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('finds a record case-insensitively', () => {
    expect(service.getMedicalRecord('omar', 'REYES')?.allergies).toEqual(['shellfish']);
    expect(service.getMedicalRecord('Lena', 'Reyes')).toBeUndefined();
  });

  it('adds a record with empty lists when none are given', async () => {
    const created = await service.addMedicalRecord({ firstName: 'Lena', lastName: 'Reyes', birthdate: '10/10/1992', medications: null });

    expect(created).toEqual({ firstName: 'Lena', lastName: 'Reyes', birthdate: '10/10/1992', medications: [], allergies: [] });
    expect(service.getAllMedicalRecords()).toHaveLength(6);
  });

  it('refuses a duplicate record', async () => {
    await expect(service.addMedicalRecord({ firstName: 'nora', lastName: 'vance', birthdate: '03/02/1980' }))
      .rejects.toBeInstanceOf(AlreadyExistsError);
  });

  it('keeps the birthdate and replaces the lists on update', async () => {
    const updated = await service.updateMedicalRecord({ firstName: 'NORA', lastName: 'Vance', allergies: ['latex'] });

    expect(updated).toEqual({
      firstName: 'Nora',
      lastName: 'Vance',
      birthdate: '03/02/1980',
      medications: [],
      allergies: ['latex'],
    });
  });

  it('resolves undefined when updating an unknown record', async () => {
    expect(await service.updateMedicalRecord({ firstName: 'Lena', lastName: 'Reyes', medications: [] })).toBeUndefined();
  });

  it('deletes a record', async () => {
    expect(await service.deleteMedicalRecord('Paul', 'Kim')).toBe(true);
    expect(service.getMedicalRecord('Paul', 'Kim')).toBeUndefined();
  });
});
