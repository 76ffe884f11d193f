import logger from '../utils/logger';
import { AlreadyExistsError, InvalidInputError } from '../utils/errors';
import { canonicalStation, normalizeKey } from '../utils/keys';
import type { DataStore } from '../utils/datastore';
import type { FireStation } from '../types/models';

const toStoredMapping = (fireStation: FireStation): { key: string; stored: FireStation } => {
  const key = normalizeKey(fireStation.address);
  const station = typeof fireStation.station === 'string' ? canonicalStation(fireStation.station) : '';
  if (!key || !station) {
    throw new InvalidInputError('Fire station address and station number must not be blank');
  }
  return { key, stored: { address: fireStation.address.trim(), station } };
};

/**
 * Address → station mappings. The address is the identity key, trimmed and
 * case-insensitive.
 */
export class FireStationRepository {
  constructor(private readonly store: DataStore) {}

  findAll(): FireStation[] {
    return this.store.snapshot('firestations').items;
  }

  /** Distinct addresses covered by the station, in document order. */
  findAddressesByStationNumber(stationNumber: number | string): string[] {
    const wanted = canonicalStation(stationNumber);
    const addresses = this.findAll()
      .filter((mapping) => canonicalStation(mapping.station) === wanted)
      .map((mapping) => mapping.address);
    return [...new Set(addresses)];
  }

  findStationNumberByAddress(address: string | null | undefined): string | undefined {
    const key = normalizeKey(address);
    if (!key) {
      return undefined;
    }
    return this.findAll().find((mapping) => normalizeKey(mapping.address) === key)?.station;
  }

  existsByAddress(address: string | null | undefined): boolean {
    const key = normalizeKey(address);
    if (!key) {
      logger.debug('existsByAddress: blank address');
      return false;
    }
    return this.findAll().some((mapping) => normalizeKey(mapping.address) === key);
  }

  async save(fireStation: FireStation): Promise<FireStation> {
    const { key, stored } = toStoredMapping(fireStation);

    await this.store.update('firestations', (mappings) => {
      const index = mappings.findIndex((existing) => normalizeKey(existing.address) === key);
      if (index >= 0) {
        mappings.splice(index, 1, stored);
      } else {
        mappings.push(stored);
      }
      return mappings;
    });

    logger.info('Fire station mapping saved', { address: stored.address, station: stored.station });
    return { ...stored };
  }

  /** Map an address that has no station yet. */
  async insert(fireStation: FireStation): Promise<FireStation> {
    const { key, stored } = toStoredMapping(fireStation);

    await this.store.update('firestations', (mappings) => {
      if (mappings.some((existing) => normalizeKey(existing.address) === key)) {
        throw new AlreadyExistsError(`A station is already mapped to ${stored.address}`);
      }
      return [...mappings, stored];
    });

    logger.info('Fire station mapping created', { address: stored.address, station: stored.station });
    return { ...stored };
  }

  /**
   * Change the station of every mapping of the address. Resolves to
   * `undefined` when the address is not mapped.
   */
  async updateStation(fireStation: FireStation): Promise<FireStation | undefined> {
    const { key, stored } = toStoredMapping(fireStation);

    const outcome: { mapping?: FireStation } = {};
    await this.store.update('firestations', (mappings) => {
      const current = mappings.find((existing) => normalizeKey(existing.address) === key);
      if (!current) {
        return null;
      }
      outcome.mapping = { address: current.address, station: stored.station };
      return mappings.map((existing) => (
        normalizeKey(existing.address) === key ? { address: existing.address, station: stored.station } : existing
      ));
    });

    if (outcome.mapping) {
      logger.info('Fire station mapping updated', { address: outcome.mapping.address, station: outcome.mapping.station });
      return { ...outcome.mapping };
    }
    return undefined;
  }

  async deleteByAddress(address: string | null | undefined): Promise<boolean> {
    const key = normalizeKey(address);
    if (!key) {
      logger.debug('Delete requested with blank address');
      return false;
    }

    const removed = await this.store.update('firestations', (mappings) => {
      const remaining = mappings.filter((mapping) => normalizeKey(mapping.address) !== key);
      return remaining.length === mappings.length ? null : remaining;
    });

    if (removed) {
      logger.info('Fire station mapping deleted', { address });
    } else {
      logger.warn('No fire station mapping found for deletion', { address });
    }
    return removed;
  }
}
