import { InvalidInputError } from './errors';

const BIRTHDATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})$/;

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const parseBirthdate = (birthdate: string): CalendarDate => {
  const match = BIRTHDATE_PATTERN.exec(birthdate.trim());
  if (!match) {
    throw new InvalidInputError(`Invalid birthdate '${birthdate}', expected MM/dd/yyyy`);
  }

  const month = Number(match[1]);
  const day = Number(match[2]);
  const year = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new InvalidInputError(`Invalid birthdate '${birthdate}', no such calendar day`);
  }

  return { year, month, day };
};

/**
 * Age in completed years on the local calendar day of `now`.
 * Throws InvalidInputError for blank, malformed or future birthdates.
 */
export const calculateAge = (birthdate: string | null | undefined, now: Date = new Date()): number => {
  if (!birthdate || birthdate.trim().length === 0) {
    throw new InvalidInputError('Birthdate must not be blank');
  }

  const born = parseBirthdate(birthdate);
  const today: CalendarDate = { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };

  const birthdayPassed = today.month > born.month || (today.month === born.month && today.day >= born.day);
  const age = today.year - born.year - (birthdayPassed ? 0 : 1);
  if (age < 0) {
    throw new InvalidInputError(`Birthdate '${birthdate}' is in the future`);
  }
  return age;
};
