import type { RecordStore } from '../../services/recordStore.js';
import { formatFullName, isMiddleNameSkip, validateNamePiece } from '../../utils/names.js';
import { SKIP_TOKEN } from '../labels.js';
import type { StepDefinition, WizardDefinition } from '../wizard/types.js';

export type RegistrationFields = {
  lastName: string | null;
  firstName: string | null;
  middleName: string | null;
};

export type RegistrationReferences = Record<string, never>;

const nameStep = (
  id: 'lastName' | 'firstName',
  prompt: string,
): StepDefinition<RegistrationFields, RegistrationReferences> => ({
  id,
  render: () => ({ text: prompt, controls: { kind: 'remove' } }),
  handle: (input, fields) => {
    if (input.kind !== 'text') {
      return { type: 'reject', hint: 'Type your name as text.' };
    }
    const result = validateNamePiece(input.text);
    if (!result.ok) {
      return { type: 'reject', hint: result.error.hint };
    }
    return { type: 'advance', fields: { ...fields, [id]: result.value } };
  },
});

export const createRegistrationWizard = (
  records: RecordStore,
): WizardDefinition<RegistrationFields, RegistrationReferences> => ({
  kind: 'registration',
  parent: 'dashboard',
  requiresRow: false,
  intro: () => '📝 Registration\n\nEnter your last name, first name and patronymic as they appear in the crew list.',
  initialFields: () => ({ lastName: null, firstName: null, middleName: null }),
  loadReferences: async () => ({}),
  steps: [
    nameStep('lastName', 'Your last name:'),
    nameStep('firstName', 'Your first name:'),
    {
      id: 'middleName',
      render: () => ({
        text: `Your patronymic, or press “${SKIP_TOKEN}”:`,
        controls: { kind: 'reply', rows: [[SKIP_TOKEN]] },
      }),
      handle: (input, fields) => {
        if (input.kind !== 'text') {
          return { type: 'reject', hint: 'Type your patronymic as text.' };
        }
        if (isMiddleNameSkip(input.text, SKIP_TOKEN)) {
          return { type: 'advance', fields: { ...fields, middleName: '' } };
        }
        const result = validateNamePiece(input.text);
        if (!result.ok) {
          return { type: 'reject', hint: result.error.hint };
        }
        return { type: 'advance', fields: { ...fields, middleName: result.value } };
      },
    },
  ],
  review: (fields) =>
    `📝 Registration\n\nName: ${formatFullName(fields.lastName ?? '', fields.firstName ?? '', fields.middleName)}`,
  missing: (fields) =>
    fields.lastName === null || fields.firstName === null ? 'Enter your last and first name first.' : null,
  persist: async (fields, _references, binding) => {
    await records.registerUser({
      userId: binding.userId,
      lastName: fields.lastName ?? '',
      firstName: fields.firstName ?? '',
      middleName: fields.middleName ?? '',
    });
  },
});
