import logger from '../utils/logger';
import { AlreadyExistsError, InvalidInputError } from '../utils/errors';
import { matchesName, nameKey, normalizeKey } from '../utils/keys';
import type { DataStore } from '../utils/datastore';
import type { Person, PersonPatch } from '../types/models';

/**
 * Persons collection. Identity is (firstName, lastName), trimmed and
 * case-insensitive.
 */
export class PersonRepository {
  constructor(private readonly store: DataStore) {}

  findAll(): Person[] {
    return this.store.snapshot('persons').items;
  }

  /** Exact, case-sensitive address filter. */
  findByAddress(address: string): Person[] {
    return this.findAll().filter((person) => person.address === address);
  }

  findByAddressIn(addresses: readonly string[]): Person[] {
    const wanted = new Set(
      addresses
        .map((address) => normalizeKey(address))
        .filter((address): address is string => address !== undefined)
    );
    if (wanted.size === 0) {
      logger.debug('findByAddressIn: no usable address, empty result');
      return [];
    }

    return this.findAll().filter((person) => {
      const address = normalizeKey(person.address);
      return address !== undefined && wanted.has(address);
    });
  }

  findByLastName(lastName: string): Person[] {
    const key = normalizeKey(lastName);
    if (!key) {
      return [];
    }
    return this.findAll().filter((person) => normalizeKey(person.lastName) === key);
  }

  findByCity(city: string): Person[] {
    const key = normalizeKey(city);
    if (!key) {
      return [];
    }
    return this.findAll().filter((person) => normalizeKey(person.city) === key);
  }

  findByFirstNameAndLastName(firstName: string | null | undefined, lastName: string | null | undefined): Person | undefined {
    const key = nameKey(firstName, lastName);
    if (!key) {
      return undefined;
    }
    return this.findAll().find((person) => matchesName(person, key));
  }

  existsById(firstName: string | null | undefined, lastName: string | null | undefined): boolean {
    const key = nameKey(firstName, lastName);
    if (!key) {
      logger.debug('existsById: blank first or last name');
      return false;
    }
    return this.findAll().some((person) => matchesName(person, key));
  }

  /**
   * Insert or replace by identity. Identity fields are stored trimmed, every
   * other field as given.
   */
  async save(person: Person): Promise<Person> {
    const key = nameKey(person.firstName, person.lastName);
    if (!key) {
      throw new InvalidInputError('Person first name and last name must not be blank');
    }

    const stored: Person = {
      ...person,
      firstName: person.firstName.trim(),
      lastName: person.lastName.trim(),
    };

    let replaced = false;
    await this.store.update('persons', (persons) => {
      const index = persons.findIndex((existing) => matchesName(existing, key));
      replaced = index >= 0;
      if (replaced) {
        persons.splice(index, 1, stored);
      } else {
        persons.push(stored);
      }
      return persons;
    });

    logger.debug('Person saved', { firstName: stored.firstName, lastName: stored.lastName, replaced });
    return { ...stored };
  }

  /**
   * Insert a person whose identity is not stored yet. The duplicate check runs
   * against the collection being written, so concurrent inserts of one
   * identity cannot both succeed.
   */
  async insert(person: Person): Promise<Person> {
    const key = nameKey(person.firstName, person.lastName);
    if (!key) {
      throw new InvalidInputError('Person first name and last name must not be blank');
    }

    const stored: Person = {
      ...person,
      firstName: person.firstName.trim(),
      lastName: person.lastName.trim(),
    };

    await this.store.update('persons', (persons) => {
      if (persons.some((existing) => matchesName(existing, key))) {
        throw new AlreadyExistsError(`Person ${stored.firstName} ${stored.lastName} already exists`);
      }
      return [...persons, stored];
    });

    logger.debug('Person inserted', { firstName: stored.firstName, lastName: stored.lastName });
    return { ...stored };
  }

  /**
   * Merge `patch` into the stored person. Omitted fields keep their value.
   * Resolves to `undefined` when nobody has that name.
   */
  async update(firstName: string, lastName: string, patch: PersonPatch): Promise<Person | undefined> {
    const key = nameKey(firstName, lastName);
    if (!key) {
      return undefined;
    }

    const outcome: { person?: Person } = {};
    await this.store.update('persons', (persons) => {
      const index = persons.findIndex((existing) => matchesName(existing, key));
      if (index < 0) {
        return null;
      }

      const current = persons[index];
      const merged: Person = {
        ...current,
        address: patch.address ?? current.address,
        city: patch.city ?? current.city,
        zip: patch.zip ?? current.zip,
        phone: patch.phone ?? current.phone,
        email: patch.email ?? current.email,
      };
      persons.splice(index, 1, merged);
      outcome.person = merged;
      return persons;
    });

    if (outcome.person) {
      logger.debug('Person updated', { firstName: outcome.person.firstName, lastName: outcome.person.lastName });
      return { ...outcome.person };
    }
    return undefined;
  }

  async deleteByFirstNameAndLastName(firstName: string | null | undefined, lastName: string | null | undefined): Promise<boolean> {
    const key = nameKey(firstName, lastName);
    if (!key) {
      logger.debug('Delete requested with blank first or last name');
      return false;
    }

    const removed = await this.store.update('persons', (persons) => {
      const remaining = persons.filter((person) => !matchesName(person, key));
      return remaining.length === persons.length ? null : remaining;
    });

    if (removed) {
      logger.info('Person deleted', { firstName, lastName });
    } else {
      logger.warn('Person not found for deletion', { firstName, lastName });
    }
    return removed;
  }
}
