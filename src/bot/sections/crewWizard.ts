import DialogueBindingError from '../../errors/DialogueBindingError.js';
import NotFoundError from '../../errors/NotFoundError.js';
import type { RecordStore } from '../../services/recordStore.js';
import { toDirectoryItems, type DirectoryItem } from '../../types/directory.js';
import { formatCompactName, isMiddleNameSkip, validateNamePiece } from '../../utils/names.js';
import { sameLabel } from '../../utils/textNormalizer.js';
import type { InlineButton } from '../chat/types.js';
import { LABELS, SECTION_TITLES, SKIP_TOKEN } from '../labels.js';
import type { StepOutcome, StepDefinition, WizardDefinition } from '../wizard/types.js';
import { actionId, appendItem, chunk, findByName, isAction } from './keyboards.js';

type PersonKind = 'driver' | 'worker';

export type PendingPerson = {
  kind: PersonKind;
  lastName: string | null;
  firstName: string | null;
};

export type CrewFields = {
  driver: string | null;
  workers: string[];
  pending: PendingPerson | null;
};

export type CrewReferences = {
  drivers: DirectoryItem[];
  workers: DirectoryItem[];
};

export const CREW_ACTIONS = {
  driver: 'crew:driver:',
  newDriver: 'crew:driver:new',
  worker: 'crew:worker:',
  newWorker: 'crew:worker:new',
  remove: 'crew:rm:',
  clear: 'crew:clear',
  done: 'crew:done',
} as const;

type Outcome = StepOutcome<CrewFields, CrewReferences>;

const byDirectoryOrder = (names: string[], directory: DirectoryItem[]): string[] => {
  const position = (name: string): number => {
    const index = directory.findIndex((item) => item.name === name);
    return index < 0 ? Number.MAX_SAFE_INTEGER : index;
  };
  return [...names].sort((left, right) => position(left) - position(right));
};

const toggleWorker = (fields: CrewFields, name: string, directory: DirectoryItem[]): CrewFields => ({
  ...fields,
  workers: fields.workers.includes(name)
    ? fields.workers.filter((worker) => worker !== name)
    : byDirectoryOrder([...fields.workers, name], directory),
});

const crewSummary = (fields: CrewFields): string =>
  [
    `Driver: ${fields.driver ?? '—'}`,
    `Workers (${fields.workers.length}): ${fields.workers.length > 0 ? fields.workers.join(', ') : '—'}`,
  ].join('\n');

const pendingTitle = (pending: PendingPerson | null): string =>
  pending?.kind === 'worker' ? 'New worker' : 'New driver';

const pickerStep = (kind: PersonKind): string => (kind === 'driver' ? 'driver' : 'workers');

const selectPerson = (fields: CrewFields, kind: PersonKind, name: string, directory: DirectoryItem[]): CrewFields => {
  if (kind === 'driver') {
    return { ...fields, driver: name, pending: null };
  }
  const workers = fields.workers.includes(name) ? fields.workers : byDirectoryOrder([...fields.workers, name], directory);
  return { ...fields, workers, pending: null };
};

export const createCrewWizard = (records: RecordStore): WizardDefinition<CrewFields, CrewReferences> => {
  // Last step of the "new person" sub-flow: directory checks, then append and select.
  const addPerson = async (
    fields: CrewFields,
    references: CrewReferences,
    pending: PendingPerson,
    middleName: string,
  ): Promise<Outcome> => {
    if (!pending.lastName || !pending.firstName) {
      return { type: 'goto', stepId: 'newLastName', fields, notice: 'Start with the last name.' };
    }
    const name = formatCompactName(pending.lastName, pending.firstName, middleName);
    const status = await records.getStatus(pending.kind, name);

    if (status === 'archived') {
      return {
        type: 'goto',
        stepId: pickerStep(pending.kind),
        fields: { ...fields, pending: null },
        notice: `“${name}” is in the archive. Contact the coordinator to restore it.`,
      };
    }

    let notice = `“${name}” is already in the list and has been selected.`;
    if (status === null) {
      await records.addEntry(pending.kind, name);
      notice = `“${name}” added to the list.`;
    }
    const directory = appendItem(pending.kind === 'driver' ? references.drivers : references.workers, name);
    const nextReferences: CrewReferences =
      pending.kind === 'driver' ? { ...references, drivers: directory } : { ...references, workers: directory };
    const nextFields = selectPerson(fields, pending.kind, name, directory);
    return { type: 'goto', stepId: 'workers', fields: nextFields, references: nextReferences, notice };
  };

  const namePieceStep = (
    id: string,
    piece: 'lastName' | 'firstName',
    prompt: string,
    next: string,
    backTo: (fields: CrewFields) => string,
  ): StepDefinition<CrewFields, CrewReferences> => ({
    id,
    detour: true,
    backTo,
    render: (fields) => ({ text: `${pendingTitle(fields.pending)}: ${prompt}`, controls: { kind: 'remove' } }),
    handle: (input, fields) => {
      if (input.kind !== 'text' || !fields.pending) {
        return { type: 'reject', hint: 'Type the name as text.' };
      }
      const result = validateNamePiece(input.text);
      if (!result.ok) {
        return { type: 'reject', hint: result.error.hint };
      }
      const pending: PendingPerson =
        piece === 'lastName'
          ? { ...fields.pending, lastName: result.value }
          : { ...fields.pending, firstName: result.value };
      return { type: 'goto', stepId: next, fields: { ...fields, pending } };
    },
  });

  const steps: StepDefinition<CrewFields, CrewReferences>[] = [
    {
      id: 'driver',
      render: (fields, references) => {
        const buttons: InlineButton[] = references.drivers.map((item) => ({
          text: item.name === fields.driver ? `✓ ${item.name}` : item.name,
          data: `${CREW_ACTIONS.driver}${item.id}`,
        }));
        return {
          text: references.drivers.length > 0 ? 'Choose the driver for this shift.' : 'No drivers yet. Add a new one.',
          controls: {
            kind: 'inline',
            rows: [...chunk(buttons, 2), [{ text: '➕ New driver', data: CREW_ACTIONS.newDriver }]],
          },
        };
      },
      handle: (input, fields, references) => {
        if (isAction(input, CREW_ACTIONS.newDriver)) {
          return {
            type: 'goto',
            stepId: 'newLastName',
            fields: { ...fields, pending: { kind: 'driver', lastName: null, firstName: null } },
          };
        }
        const id = actionId(input, CREW_ACTIONS.driver);
        if (id !== null) {
          const item = references.drivers.find((candidate) => candidate.id === id);
          if (!item) {
            throw new NotFoundError('driver', id);
          }
          return { type: 'advance', fields: { ...fields, driver: item.name } };
        }
        const typed = input.kind === 'text' ? findByName(references.drivers, input.text) : undefined;
        if (typed) {
          return { type: 'advance', fields: { ...fields, driver: typed.name } };
        }
        return { type: 'reject', hint: 'Pick the driver from the list or add a new one.' };
      },
    },
    namePieceStep('newLastName', 'lastName', 'enter the last name.', 'newFirstName', (fields) =>
      pickerStep(fields.pending?.kind ?? 'driver'),
    ),
    namePieceStep('newFirstName', 'firstName', 'enter the first name.', 'newMiddleName', () => 'newLastName'),
    {
      id: 'newMiddleName',
      detour: true,
      backTo: () => 'newFirstName',
      render: (fields) => ({
        text: `${pendingTitle(fields.pending)}: enter the patronymic or press “${SKIP_TOKEN}”.`,
        controls: { kind: 'reply', rows: [[SKIP_TOKEN]] },
      }),
      handle: async (input, fields, references) => {
        if (input.kind !== 'text' || !fields.pending) {
          return { type: 'reject', hint: 'Type the patronymic as text.' };
        }
        if (isMiddleNameSkip(input.text, SKIP_TOKEN)) {
          return addPerson(fields, references, fields.pending, '');
        }
        const result = validateNamePiece(input.text);
        if (!result.ok) {
          return { type: 'reject', hint: result.error.hint };
        }
        return addPerson(fields, references, fields.pending, result.value);
      },
    },
    {
      id: 'workers',
      render: (fields, references) => {
        const selected = references.workers.filter((item) => fields.workers.includes(item.name));
        const removeRows = chunk(
          selected.map((item) => ({ text: `✖ ${item.name}`, data: `${CREW_ACTIONS.remove}${item.id}` })),
          2,
        );
        const toggleRows = chunk(
          references.workers.map((item) => ({
            text: fields.workers.includes(item.name) ? `✓ ${item.name}` : item.name,
            data: `${CREW_ACTIONS.worker}${item.id}`,
          })),
          2,
        );
        const tools: InlineButton[] = [{ text: '➕ New worker', data: CREW_ACTIONS.newWorker }];
        if (fields.workers.length > 0) {
          tools.push({ text: '🧹 Clear all', data: CREW_ACTIONS.clear });
        }
        return {
          text: `${crewSummary(fields)}\n\nTap workers to add or remove them, then press “${LABELS.done}”.`,
          controls: {
            kind: 'inline',
            rows: [...removeRows, ...toggleRows, tools, [{ text: LABELS.done, data: CREW_ACTIONS.done }]],
          },
        };
      },
      handle: (input, fields, references) => {
        if (fields.driver === null) {
          return { type: 'goto', stepId: 'driver', fields, notice: 'Choose the driver first.' };
        }
        if (isAction(input, CREW_ACTIONS.newWorker)) {
          return {
            type: 'goto',
            stepId: 'newLastName',
            fields: { ...fields, pending: { kind: 'worker', lastName: null, firstName: null } },
          };
        }
        if (isAction(input, CREW_ACTIONS.clear)) {
          return { type: 'stay', fields: { ...fields, workers: [] }, notice: 'Selection cleared.' };
        }
        if (isAction(input, CREW_ACTIONS.done) || (input.kind === 'text' && sameLabel(input.text, LABELS.done))) {
          if (fields.workers.length === 0) {
            return { type: 'reject', hint: 'Select at least one worker.' };
          }
          return { type: 'advance', fields };
        }

        const toggledId = actionId(input, CREW_ACTIONS.worker);
        if (toggledId !== null) {
          const item = references.workers.find((candidate) => candidate.id === toggledId);
          if (!item) {
            throw new NotFoundError('worker', toggledId);
          }
          return { type: 'stay', fields: toggleWorker(fields, item.name, references.workers) };
        }

        const removedId = actionId(input, CREW_ACTIONS.remove);
        if (removedId !== null) {
          const item = references.workers.find((candidate) => candidate.id === removedId);
          if (!item || !fields.workers.includes(item.name)) {
            return { type: 'stay', fields, notice: 'That worker is not in the crew.' };
          }
          return { type: 'stay', fields: { ...fields, workers: fields.workers.filter((name) => name !== item.name) } };
        }

        const typed = input.kind === 'text' ? findByName(references.workers, input.text) : undefined;
        if (typed) {
          if (fields.workers.includes(typed.name)) {
            return { type: 'stay', fields, notice: `${typed.name} is already in the crew.` };
          }
          return { type: 'stay', fields: toggleWorker(fields, typed.name, references.workers) };
        }
        return { type: 'reject', hint: 'Tap a worker in the list or add a new one.' };
      },
    },
  ];

  return {
    kind: 'crew',
    parent: 'menu',
    requiresRow: true,
    intro: () => `${SECTION_TITLES.crew}\n\nChoose the driver, then the workers on this shift.`,
    initialFields: () => ({ driver: null, workers: [], pending: null }),
    loadReferences: async () => {
      const [drivers, workers] = await Promise.all([records.listActive('driver'), records.listActive('worker')]);
      return { drivers: toDirectoryItems(drivers), workers: toDirectoryItems(workers) };
    },
    steps,
    review: (fields) => `${SECTION_TITLES.crew}\n\n${crewSummary(fields)}`,
    missing: (fields) => {
      if (fields.driver === null) {
        return 'Choose the driver first.';
      }
      return fields.workers.length === 0 ? 'Select at least one worker.' : null;
    },
    persist: async (fields, _references, binding) => {
      if (binding.row === null) {
        throw new DialogueBindingError('Crew save without a shift row');
      }
      if (fields.driver === null) {
        throw new Error('Crew save without a driver');
      }
      await records.writeSection(binding.row, {
        section: 'crew',
        record: { driver: fields.driver, workers: fields.workers },
      });
    },
  };
};
