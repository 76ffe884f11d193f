import logger from '../utils/logger';
import { calculateAge } from '../utils/age';
import { InvalidInputError } from '../utils/errors';
import type { PersonRepository } from '../repositories/person.repository';
import type { MedicalRecordRepository } from '../repositories/medicalRecord.repository';
import type { FireStationRepository } from '../repositories/fireStation.repository';
import type { MedicalRecord, Person, PersonPatch } from '../types/models';
import type {
  ChildAlertDTO,
  ChildInfoDTO,
  CommunityEmailDTO,
  FireAlertDTO,
  PersonContactDTO,
  PersonInfoByLastNameDTO,
  PersonInfoDTO,
  ResidentMedicalDTO,
} from '../types/dto';

export interface AgeOptions {
  /** Persons aged up to and including this value are children. */
  childAgeThreshold: number;
  clock?: () => Date;
}

/** Fields of a person that an update may change. */
export type PersonUpdate = Pick<Person, 'firstName' | 'lastName'> & PersonPatch;

export interface ResidentWithRecord {
  person: Person;
  record: MedicalRecord;
  age: number;
}

export const toContact = (person: Person): PersonContactDTO => ({
  firstName: person.firstName,
  lastName: person.lastName,
  address: person.address,
  phone: person.phone,
});

/**
 * Person CRUD and the person-centred alert views.
 */
export class PersonService {
  private readonly clock: () => Date;

  constructor(
    private readonly persons: PersonRepository,
    private readonly medicalRecords: MedicalRecordRepository,
    private readonly fireStations: FireStationRepository,
    private readonly options: AgeOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  isChild(age: number): boolean {
    return age <= this.options.childAgeThreshold;
  }

  /**
   * Join a person with their medical record and age. Persons without a record
   * or with an unusable birthdate are logged and left out.
   */
  withMedicalRecord(person: Person): ResidentWithRecord | undefined {
    const record = this.medicalRecords.findByFirstNameAndLastName(person.firstName, person.lastName);
    if (!record) {
      logger.warn('No medical record for person', { firstName: person.firstName, lastName: person.lastName });
      return undefined;
    }

    try {
      return { person, record, age: calculateAge(record.birthdate, this.clock()) };
    } catch (error) {
      if (error instanceof InvalidInputError) {
        logger.warn('Unusable birthdate, person skipped', {
          firstName: person.firstName,
          lastName: person.lastName,
          birthdate: record.birthdate,
          reason: error.message
        });
        return undefined;
      }
      throw error;
    }
  }

  getAllPersons(): Person[] {
    return this.persons.findAll();
  }

  addPerson(person: Person): Promise<Person> {
    return this.persons.insert(person);
  }

  /**
   * Update the contact fields of an existing person. Omitted fields keep their
   * stored value. Resolves to `undefined` when nobody has that name.
   */
  async updatePerson(update: PersonUpdate): Promise<Person | undefined> {
    const { firstName, lastName, ...patch } = update;
    const updated = await this.persons.update(firstName, lastName, patch);
    if (!updated) {
      logger.warn('Person not found for update', { firstName, lastName });
    }
    return updated;
  }

  deletePerson(firstName: string, lastName: string): Promise<boolean> {
    return this.persons.deleteByFirstNameAndLastName(firstName, lastName);
  }

  /**
   * Children living at the address, with the adults they live with. Absent
   * when no child lives there.
   */
  getChildAlert(address: string): ChildAlertDTO | undefined {
    const children: ChildInfoDTO[] = [];
    const familyMembers: PersonContactDTO[] = [];

    for (const person of this.persons.findByAddressIn([address])) {
      const resident = this.withMedicalRecord(person);
      if (!resident) {
        continue;
      }
      if (this.isChild(resident.age)) {
        children.push({ firstName: person.firstName, lastName: person.lastName, age: resident.age });
      } else {
        familyMembers.push(toContact(person));
      }
    }

    logger.debug('Child alert computed', { address, children: children.length, familyMembers: familyMembers.length });
    return children.length > 0 ? { children, familyMembers } : undefined;
  }

  /**
   * Residents of the address with their medical data and covering station.
   * Absent when no resident has a medical record.
   */
  getFireAlert(address: string): FireAlertDTO | undefined {
    const residents = this.persons.findByAddressIn([address]);
    if (residents.length === 0) {
      return undefined;
    }

    const fireStation = this.fireStations.findStationNumberByAddress(address) ?? null;
    const persons: ResidentMedicalDTO[] = [];
    for (const person of residents) {
      const resident = this.withMedicalRecord(person);
      if (!resident) {
        continue;
      }
      persons.push({
        lastName: person.lastName,
        phone: person.phone,
        fireStation,
        age: resident.age,
        medications: resident.record.medications,
        allergies: resident.record.allergies,
      });
    }

    logger.debug('Fire alert computed', { address, fireStation, persons: persons.length });
    return persons.length > 0 ? { persons } : undefined;
  }

  getPersonInfoByLastName(lastName: string): PersonInfoByLastNameDTO | undefined {
    const matches = this.persons.findByLastName(lastName);
    if (matches.length === 0) {
      return undefined;
    }

    const personInfoList: PersonInfoDTO[] = [];
    for (const person of matches) {
      const resident = this.withMedicalRecord(person);
      if (!resident) {
        continue;
      }
      personInfoList.push({
        firstName: person.firstName,
        lastName: person.lastName,
        address: person.address,
        age: resident.age,
        email: person.email,
        medications: resident.record.medications,
        allergies: resident.record.allergies,
      });
    }

    return { lastName: lastName.trim(), personInfoList };
  }

  /** Distinct, non-blank e-mails of the city's residents. */
  getCommunityEmail(city: string): CommunityEmailDTO | undefined {
    const residents = this.persons.findByCity(city);
    if (residents.length === 0) {
      return undefined;
    }

    const emails = [...new Set(
      residents
        .map((person) => person.email.trim())
        .filter((email) => email.length > 0)
    )];
    return { city: city.trim(), emails };
  }
}
