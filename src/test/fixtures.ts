import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { JsonDataStore } from '../utils/datastore';
import type { DataDocument } from '../types/models';

export const emptyDocument = (): DataDocument => ({ persons: [], firestations: [], medicalrecords: [] });

export interface TempStore {
  dir: string;
  dataFile: string;
  seedFile: string;
  store: JsonDataStore;
  cleanup(): Promise<void>;
}

/**
 * Open a store whose data file starts as `document`, inside a fresh temporary
 * directory.
 */
export const openTempStore = async (document: Partial<DataDocument> = {}): Promise<TempStore> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'safetynet-test-'));
  const dataFile = path.join(dir, 'data.json');
  const seedFile = path.join(dir, 'seed.json');

  await writeFile(dataFile, JSON.stringify({ ...emptyDocument(), ...document }), 'utf-8');
  await writeFile(seedFile, JSON.stringify(emptyDocument()), 'utf-8');

  const store = await JsonDataStore.open({ dataFile, seedFile });
  return {
    dir,
    dataFile,
    seedFile,
    store,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
};

/** 15 June 2024, local time. */
export const FIXED_NOW = new Date(2024, 5, 15, 12, 0, 0);

export const fixedClock = () => new Date(FIXED_NOW.getTime());

/**
 * Two households at station 1, one resident with an unusable birthdate at
 * station 2 and an address without residents at station 3.
 */
export const sampleDocument = (): DataDocument => ({
  persons: [
    { firstName: 'Nora', lastName: 'Vance', address: '5 Elm St', city: 'Riverton', zip: '30001', phone: '555-1000', email: 'nora@example.com' },
    { firstName: 'Theo', lastName: 'Vance', address: '5 Elm St', city: 'Riverton', zip: '30001', phone: '555-1001', email: 'theo@example.com' },
    { firstName: 'Ivy', lastName: 'Vance', address: '5 Elm St', city: 'Riverton', zip: '30001', phone: '555-1002', email: 'nora@example.com' },
    { firstName: 'Omar', lastName: 'Reyes', address: '9 Oak Ct', city: 'Riverton', zip: '30002', phone: '555-2000', email: 'omar@example.com' },
    { firstName: 'Lena', lastName: 'Reyes', address: '9 Oak Ct', city: 'Hillcrest', zip: '30002', phone: '555-2001', email: 'lena@example.com' },
    { firstName: 'Paul', lastName: 'Kim', address: '14 Birch Rd', city: 'Hillcrest', zip: '30003', phone: '555-3000', email: 'paul@example.com' },
  ],
  firestations: [
    { address: '5 Elm St', station: '1' },
    { address: '9 Oak Ct', station: '1' },
    { address: '14 Birch Rd', station: '2' },
    { address: '22 Cedar Way', station: '3' },
  ],
  medicalrecords: [
    { firstName: 'Nora', lastName: 'Vance', birthdate: '03/02/1980', medications: ['aspirin:100mg'], allergies: [] },
    { firstName: 'Theo', lastName: 'Vance', birthdate: '08/20/2012', medications: [], allergies: ['peanut'] },
    { firstName: 'Ivy', lastName: 'Vance', birthdate: '06/15/2006', medications: [], allergies: [] },
    { firstName: 'Omar', lastName: 'Reyes', birthdate: '01/01/1990', medications: ['ibuprofen:200mg'], allergies: ['shellfish'] },
    { firstName: 'Paul', lastName: 'Kim', birthdate: 'not-a-date', medications: [], allergies: [] },
  ],
});
