import { normalize } from './textNormalizer.js';
import { fail, ok, type Result, type ValidationFailure } from './result.js';

const NAME_PIECE_PATTERN = /^[\p{L}\- ]{1,50}$/u;
const SHIP_NAME_PATTERN = /^[\p{L}0-9][\p{L}0-9\- ]{1,49}$/u;

const SKIP_MIDDLE_NAME = new Set(['', '-', '—', 'no', 'none', 'skip']);

const capitalize = (word: string): string =>
  word.length === 0 ? word : word[0].toLocaleUpperCase() + word.slice(1).toLocaleLowerCase();

const titleCase = (value: string): string =>
  value
    .split(' ')
    .map((part) => part.split('-').map(capitalize).join('-'))
    .join(' ');

export const collapseSpaces = (value: string): string => value.replace(/\s+/g, ' ').trim();

export const validateNamePiece = (text: string | null | undefined): Result<string, ValidationFailure> => {
  const value = collapseSpaces(text ?? '');
  if (!NAME_PIECE_PATTERN.test(value) || !/\p{L}/u.test(value)) {
    return fail('InvalidName', 'Use letters, spaces and hyphens only (1–50 characters).');
  }
  return ok(titleCase(value));
};

export const isMiddleNameSkip = (text: string | null | undefined, skipToken: string): boolean => {
  const value = normalize(text);
  return SKIP_MIDDLE_NAME.has(value) || value === normalize(skipToken);
};

export const formatCompactName = (last: string, first: string, middle?: string | null): string => {
  const initials = [first, middle ?? '']
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => `${part[0].toLocaleUpperCase()}.`);
  return [last.trim(), ...initials].join(' ');
};

export const formatFullName = (last: string, first: string, middle?: string | null): string =>
  [last, first, middle ?? ''].map((part) => part.trim()).filter((part) => part.length > 0).join(' ');

export const validateShipName = (text: string | null | undefined): Result<string, ValidationFailure> => {
  const value = collapseSpaces(text ?? '');
  if (!SHIP_NAME_PATTERN.test(value)) {
    return fail(
      'InvalidShipName',
      'Ship name must start with a letter or digit and have 2–50 characters: letters, digits, hyphens, spaces.',
    );
  }
  return ok(value[0].toLocaleUpperCase() + value.slice(1));
};
