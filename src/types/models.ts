/**
 * Entities persisted in the backing JSON document.
 */

export interface Person {
  firstName: string;
  lastName: string;
  address: string;
  city: string;
  zip: string;
  phone: string;
  email: string;
}

/** Contact fields an update may change; identity stays as stored. */
export type PersonPatch = Partial<Omit<Person, 'firstName' | 'lastName'>>;

/** Maps an address to the station covering it. */
export interface FireStation {
  address: string;
  station: string;
}

export interface MedicalRecord {
  firstName: string;
  lastName: string;
  /** MM/dd/yyyy */
  birthdate: string;
  medications: string[];
  allergies: string[];
}

/**
 * Medical record as accepted on the write path; lists may be missing and are
 * normalized to empty arrays when stored.
 */
export interface MedicalRecordInput {
  firstName: string;
  lastName: string;
  birthdate?: string | null;
  medications?: string[] | null;
  allergies?: string[] | null;
}

export interface CollectionItems {
  persons: Person;
  firestations: FireStation;
  medicalrecords: MedicalRecord;
}

export type CollectionName = keyof CollectionItems;

export type DataDocument = { [K in CollectionName]: CollectionItems[K][] };
