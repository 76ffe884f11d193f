import { PersonRepository } from './repositories/person.repository';
import { MedicalRecordRepository } from './repositories/medicalRecord.repository';
import { FireStationRepository } from './repositories/fireStation.repository';
import { PersonService } from './services/person.service';
import { FireStationService } from './services/fireStation.service';
import { MedicalRecordService } from './services/medicalRecord.service';
import type { DataStore } from './utils/datastore';

export interface AppContext {
  repositories: {
    persons: PersonRepository;
    medicalRecords: MedicalRecordRepository;
    fireStations: FireStationRepository;
  };
  services: {
    persons: PersonService;
    medicalRecords: MedicalRecordService;
    fireStations: FireStationService;
  };
}

export interface ContextOptions {
  childAgeThreshold: number;
  clock?: () => Date;
}

export const createContext = (store: DataStore, options: ContextOptions): AppContext => {
  const persons = new PersonRepository(store);
  const medicalRecords = new MedicalRecordRepository(store);
  const fireStations = new FireStationRepository(store);

  const personService = new PersonService(persons, medicalRecords, fireStations, options);

  return {
    repositories: { persons, medicalRecords, fireStations },
    services: {
      persons: personService,
      medicalRecords: new MedicalRecordService(medicalRecords),
      fireStations: new FireStationService(fireStations, persons, personService),
    },
  };
};
