import type { DirectoryItem } from '../../types/directory.js';
import { normalize } from '../../utils/textNormalizer.js';
import type { WizardInput } from '../wizard/types.js';

export const chunk = <T>(items: T[], size: number): T[][] => {
  const rows: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    rows.push(items.slice(index, index + size));
  }
  return rows;
};

/** Reads the numeric id out of callback data such as `crew:driver:3`. */
export const actionId = (input: WizardInput, prefix: string): number | null => {
  if (input.kind !== 'action' || !input.data.startsWith(prefix)) {
    return null;
  }
  const rest = input.data.slice(prefix.length);
  return /^\d+$/.test(rest) ? Number.parseInt(rest, 10) : null;
};

export const isAction = (input: WizardInput, data: string): boolean => input.kind === 'action' && input.data === data;

export const findByName = (items: DirectoryItem[], name: string): DirectoryItem | undefined => {
  const wanted = normalize(name);
  return items.find((item) => normalize(item.name) === wanted);
};

export const appendItem = (items: DirectoryItem[], name: string): DirectoryItem[] =>
  findByName(items, name) ? items : [...items, { id: items.reduce((max, item) => Math.max(max, item.id), 0) + 1, name }];
