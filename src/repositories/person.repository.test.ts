import { readFile } from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PersonRepository } from './person.repository';
import { AlreadyExistsError, InvalidInputError } from '../utils/errors';
import { openTempStore } from '../test/fixtures';
import type { TempStore } from '../test/fixtures';
import type { Person } from '../types/models';

const milo: Person = {
  firstName: 'Milo',
  lastName: 'Grant',
  address: '1 Main St',
  city: 'Brackenford',
  zip: '60210',
  phone: '555-0001',
  email: 'milo@example.com',
};

const jane: Person = {
  firstName: 'Jane',
  lastName: 'Hart',
  address: '4 Pond Rd',
  city: 'Brackenford',
  zip: '60210',
  phone: '555-0002',
  email: 'jane@example.com',
};

describe('PersonRepository', () => {
  let temp: TempStore;
  let repository: PersonRepository;

  beforeEach(async () => {
    temp = await openTempStore({ persons: [milo, jane] });
    repository = new PersonRepository(temp.store);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await temp.cleanup();
  });

  describe('save', () => {
    it('stores a new person with trimmed identity and finds it case-insensitively', async () => {
      const saved = await repository.save({ ...jane, firstName: '  Maya ', lastName: ' Stone  ' });

      expect(saved.firstName).toBe('Maya');
      expect(saved.lastName).toBe('Stone');
      expect(repository.findByFirstNameAndLastName('MAYA', 'stone')).toEqual(saved);
      expect(repository.findAll()).toHaveLength(3);
    });

    it('replaces the person with the same identity in place', async () => {
      await repository.save({ ...milo, firstName: 'milo', lastName: ' GRANT ', address: '2 Oak St' });

      const grants = repository.findByLastName('Grant');
      expect(grants).toEqual([{ ...milo, firstName: 'milo', lastName: 'GRANT', address: '2 Oak St' }]);
      expect(repository.findAll().map((person) => person.firstName)).toEqual(['milo', 'Jane']);
    });

    it('persists to the data file', async () => {
      await repository.save({ ...jane, firstName: 'Maya', lastName: 'Stone' });

      const document = JSON.parse(await readFile(temp.dataFile, 'utf-8'));
      expect(document.persons).toHaveLength(3);
    });

    it('rejects a blank identity without writing', async () => {
      const swap = vi.spyOn(temp.store, 'compareAndSwap');

      await expect(repository.save({ ...milo, firstName: '   ' })).rejects.toBeInstanceOf(InvalidInputError);
      expect(swap).not.toHaveBeenCalled();
    });
  });

  describe('finders', () => {
    it('matches addresses exactly in findByAddress', () => {
      expect(repository.findByAddress('1 Main St')).toEqual([milo]);
      expect(repository.findByAddress('1 main st')).toEqual([]);
    });

    it('matches addresses ignoring case and whitespace in findByAddressIn', () => {
      expect(repository.findByAddressIn(['1 MAIN ST'])).toEqual([milo]);
      expect(repository.findByAddressIn([' 4 pond rd', '9 Nowhere'])).toEqual([jane]);
    });

    it('does not read the store for an empty address set', () => {
      const snapshot = vi.spyOn(temp.store, 'snapshot');

      expect(repository.findByAddressIn([])).toEqual([]);
      expect(repository.findByAddressIn(['  '])).toEqual([]);
      expect(snapshot).not.toHaveBeenCalled();
    });

    it('trims and ignores case for last name and city', () => {
      expect(repository.findByLastName(' grant ')).toEqual([milo]);
      expect(repository.findByCity(' BRACKENFORD')).toEqual([milo, jane]);
      expect(repository.findByCity('Springfield')).toEqual([]);
    });

    it('returns undefined when either name is blank', () => {
      expect(repository.findByFirstNameAndLastName('Milo', '')).toBeUndefined();
      expect(repository.findByFirstNameAndLastName(undefined, 'Grant')).toBeUndefined();
    });
  });

  describe('existsById', () => {
    it('is case-insensitive', () => {
      expect(repository.existsById(' MILO', 'grant')).toBe(true);
      expect(repository.existsById('Milo', 'Hart')).toBe(false);
    });

    it('answers false for blank input without reading the store', () => {
      const snapshot = vi.spyOn(temp.store, 'snapshot');

      expect(repository.existsById(null, 'Grant')).toBe(false);
      expect(repository.existsById('', 'Grant')).toBe(false);
      expect(repository.existsById('Milo', '   ')).toBe(false);
      expect(snapshot).not.toHaveBeenCalled();
    });
  });

  describe('deleteByFirstNameAndLastName', () => {
    it('removes the person whatever the casing', async () => {
      expect(await repository.deleteByFirstNameAndLastName('mILO', 'GRANT ')).toBe(true);
      expect(repository.findAll()).toEqual([jane]);
    });

    it('returns false and writes nothing for an unknown person', async () => {
      const before = await readFile(temp.dataFile, 'utf-8');
      const swap = vi.spyOn(temp.store, 'compareAndSwap');

      expect(await repository.deleteByFirstNameAndLastName('Nobody', 'Here')).toBe(false);
      expect(swap).not.toHaveBeenCalled();
      expect(await readFile(temp.dataFile, 'utf-8')).toBe(before);
    });

    it('returns false for a blank name', async () => {
      expect(await repository.deleteByFirstNameAndLastName('', 'Grant')).toBe(false);
      expect(repository.findAll()).toHaveLength(2);
    });
  });

  describe('insert', () => {
    it('adds a person with a new identity', async () => {
      const inserted = await repository.insert({ ...jane, firstName: ' Maya', lastName: 'Stone ' });

      expect(inserted).toEqual({ ...jane, firstName: 'Maya', lastName: 'Stone' });
      expect(repository.findAll()).toHaveLength(3);
    });

    it('refuses an identity that is already stored', async () => {
      await expect(repository.insert({ ...jane, firstName: 'MILO', lastName: 'grant' })).rejects.toBeInstanceOf(AlreadyExistsError);
      expect(repository.findAll()).toEqual([milo, jane]);
    });

    it('lets only one of two concurrent inserts of the same identity through', async () => {
      const results = await Promise.allSettled([
        repository.insert({ ...jane, firstName: 'Sam', lastName: 'Reed', phone: '555-0101' }),
        repository.insert({ ...jane, firstName: 'SAM', lastName: 'reed', phone: '555-0202' }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      const rejected = results[1];
      expect(rejected.status === 'rejected' && rejected.reason instanceof AlreadyExistsError).toBe(true);
      expect(repository.findByLastName('Reed')).toEqual([{ ...jane, firstName: 'Sam', lastName: 'Reed', phone: '555-0101' }]);
    });
  });

  describe('update', () => {
    it('merges the given fields into the stored person', async () => {
      const updated = await repository.update('milo', 'GRANT', { phone: '555-0909', email: undefined });

      expect(updated).toEqual({ ...milo, phone: '555-0909' });
      expect(repository.findAll()).toEqual([{ ...milo, phone: '555-0909' }, jane]);
    });

    it('keeps both of two concurrent partial updates', async () => {
      await Promise.all([
        repository.update('Milo', 'Grant', { phone: '555-0909' }),
        repository.update('Milo', 'Grant', { email: 'milo.grant@example.com' }),
      ]);

      expect(repository.findByFirstNameAndLastName('Milo', 'Grant')).toEqual({
        ...milo,
        phone: '555-0909',
        email: 'milo.grant@example.com',
      });
    });

    it('resolves undefined and writes nothing for an unknown person', async () => {
      const swap = vi.spyOn(temp.store, 'compareAndSwap');

      expect(await repository.update('Nobody', 'Here', { phone: '555-0000' })).toBeUndefined();
      expect(swap).not.toHaveBeenCalled();
    });
  });
});
