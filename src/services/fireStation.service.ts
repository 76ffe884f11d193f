import logger from '../utils/logger';
import { toContact } from './person.service';
import type { PersonService } from './person.service';
import type { FireStationRepository } from '../repositories/fireStation.repository';
import type { PersonRepository } from '../repositories/person.repository';
import type { FireStation } from '../types/models';
import type {
  AddressResidentsDTO,
  FloodDTO,
  FloodStationDTO,
  PhoneAlertDTO,
  StationCoverageDTO,
} from '../types/dto';

/**
 * Station mappings CRUD and the station-centred alert views.
 */
export class FireStationService {
  constructor(
    private readonly fireStations: FireStationRepository,
    private readonly persons: PersonRepository,
    private readonly personService: PersonService
  ) {}

  getAllFireStations(): FireStation[] {
    return this.fireStations.findAll();
  }

  addFireStation(fireStation: FireStation): Promise<FireStation> {
    return this.fireStations.insert(fireStation);
  }

  /** Resolves to `undefined` when the address has no mapping yet. */
  async updateFireStation(fireStation: FireStation): Promise<FireStation | undefined> {
    const updated = await this.fireStations.updateStation(fireStation);
    if (!updated) {
      logger.warn('Fire station mapping not found for update', { address: fireStation.address });
    }
    return updated;
  }

  deleteFireStation(address: string): Promise<boolean> {
    return this.fireStations.deleteByAddress(address);
  }

  /**
   * Everyone living at the station's addresses with adult and child counts.
   * Persons whose age is unknown are listed but not counted.
   */
  getStationCoverage(stationNumber: string): StationCoverageDTO | undefined {
    const addresses = this.fireStations.findAddressesByStationNumber(stationNumber);
    if (addresses.length === 0) {
      logger.debug('Station covers no address', { stationNumber });
      return undefined;
    }

    const people = this.persons.findByAddressIn(addresses);
    let adultCount = 0;
    let childCount = 0;
    for (const person of people) {
      const resident = this.personService.withMedicalRecord(person);
      if (!resident) {
        continue;
      }
      if (this.personService.isChild(resident.age)) {
        childCount++;
      } else {
        adultCount++;
      }
    }

    logger.debug('Station coverage computed', { stationNumber, people: people.length, adultCount, childCount });
    return { people: people.map(toContact), adultCount, childCount };
  }

  /** Phone numbers of the station's residents, duplicates included. */
  getPhoneAlert(stationNumber: string): PhoneAlertDTO | undefined {
    const addresses = this.fireStations.findAddressesByStationNumber(stationNumber);
    if (addresses.length === 0) {
      return undefined;
    }
    return { phones: this.persons.findByAddressIn(addresses).map((person) => person.phone) };
  }

  /**
   * Households grouped by address for each requested station. Stations and
   * addresses without residents are left out.
   */
  getFloodStations(stationNumbers: readonly string[]): FloodDTO {
    const stations: FloodStationDTO[] = [];

    for (const stationNumber of stationNumbers) {
      const households: AddressResidentsDTO[] = [];
      for (const address of this.fireStations.findAddressesByStationNumber(stationNumber)) {
        const alert = this.personService.getFireAlert(address);
        if (alert) {
          households.push({ address, persons: alert.persons });
        }
      }

      if (households.length > 0) {
        stations.push({ fireStation: stationNumber, persons: households });
      } else {
        logger.debug('No household found for station', { stationNumber });
      }
    }

    return { fireStationAddressPersonMedicalRecords: stations };
  }
}
