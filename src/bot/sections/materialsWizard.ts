import DialogueBindingError from '../../errors/DialogueBindingError.js';
import ExternalServiceError from '../../errors/ExternalServiceError.js';
import { contentTypeOf, type FileStore, type FolderHandle } from '../../services/fileStore.js';
import type { RecordStore } from '../../services/recordStore.js';
import { parseAmount } from '../../utils/amountParser.js';
import { timeLabelOf } from '../../utils/dates.js';
import { padOrdinal } from '../../utils/formatters.js';
import logger from '../../utils/logger.js';
import { sameLabel } from '../../utils/textNormalizer.js';
import type { ChatPlatform } from '../chat/types.js';
import { LABELS, SECTION_TITLES, SKIP_TOKEN } from '../labels.js';
import type { StepDefinition, WizardDefinition } from '../wizard/types.js';

export type PhotoReference = {
  fileReference: string;
  timeLabel: string;
};

export type MaterialsFields = {
  pvdMeters: number | null;
  pvcTubes: number | null;
  tape: number | null;
  photos: PhotoReference[];
};

export type MaterialsReferences = {
  shiftDate: string;
};

type CountKey = 'pvdMeters' | 'pvcTubes' | 'tape';

export type MaterialsWizardDependencies = {
  records: RecordStore;
  files: FileStore;
  chat: ChatPlatform;
  timezone: string;
};

const MAX_NAME_ATTEMPTS = 99;
const DEFAULT_EXTENSION = '.jpg';

export const photoFileName = (timeLabel: string, userId: number, ordinal: number, extension: string): string =>
  `${timeLabel}_${userId}_${padOrdinal(ordinal)}${extension}`;

/**
 * Uploads under `<time>_<user>_<NN>` starting from the given ordinal and moves to the next ordinal
 * whenever the name is already taken in the folder.
 */
export async function uploadWithFreeName(
  files: FileStore,
  folder: FolderHandle,
  content: Buffer,
  photo: { timeLabel: string; userId: number; ordinal: number; extension: string },
): Promise<string> {
  const contentType = contentTypeOf(photo.extension);
  for (let ordinal = photo.ordinal; ordinal < photo.ordinal + MAX_NAME_ATTEMPTS; ordinal += 1) {
    const name = photoFileName(photo.timeLabel, photo.userId, ordinal, photo.extension);
    const outcome = await files.upload(content, name, folder, contentType);
    if (outcome.status === 'uploaded') {
      return outcome.name;
    }
    logger.debug(`[materials] ${name} already exists in ${folder.title}, trying the next ordinal`);
  }
  throw new ExternalServiceError('files.upload', `No free file name for ${photo.timeLabel}_${photo.userId}`);
}

const countStep = (
  key: CountKey,
  prompt: string,
): StepDefinition<MaterialsFields, MaterialsReferences> => ({
  id: key,
  render: () => ({
    text: `${prompt} Enter a number or press “${SKIP_TOKEN}”.`,
    controls: { kind: 'reply', rows: [[SKIP_TOKEN]] },
  }),
  handle: (input, fields) => {
    if (input.kind !== 'text') {
      return { type: 'reject', hint: 'Type the number as digits.' };
    }
    const result = parseAmount(input.text, SKIP_TOKEN);
    if (!result.ok) {
      return { type: 'reject', hint: result.error.hint };
    }
    return { type: 'advance', fields: { ...fields, [key]: result.value } };
  },
});

export const createMaterialsWizard = ({
  records,
  files,
  chat,
  timezone,
}: MaterialsWizardDependencies): WizardDefinition<MaterialsFields, MaterialsReferences> => {
  const steps: StepDefinition<MaterialsFields, MaterialsReferences>[] = [
    countStep('pvdMeters', 'PVD film used, in meters.'),
    countStep('pvcTubes', 'PVC tubes used, in pieces.'),
    countStep('tape', 'Tape rolls used, in pieces.'),
    {
      id: 'photos',
      render: (fields) => ({
        text:
          fields.photos.length === 0
            ? `Send photos of the materials. Press “${LABELS.done}” when finished.`
            : `Photos added: ${fields.photos.length}. Send more or press “${LABELS.done}”.`,
        controls: {
          kind: 'reply',
          rows: fields.photos.length > 0 ? [[LABELS.done], [LABELS.deleteLastPhoto]] : [[LABELS.done]],
        },
      }),
      handle: (input, fields) => {
        if (input.kind === 'photo') {
          const photos = [...fields.photos, { fileReference: input.fileReference, timeLabel: timeLabelOf(input.sentAt, timezone) }];
          return { type: 'stay', fields: { ...fields, photos }, notice: `📸 Photo ${photos.length} added.` };
        }
        if (input.kind === 'text' && sameLabel(input.text, LABELS.deleteLastPhoto)) {
          if (fields.photos.length === 0) {
            return { type: 'reject', hint: 'There are no photos to delete.' };
          }
          return { type: 'stay', fields: { ...fields, photos: fields.photos.slice(0, -1) }, notice: 'Last photo removed.' };
        }
        if (input.kind === 'text' && sameLabel(input.text, LABELS.done)) {
          if (fields.photos.length === 0) {
            return { type: 'reject', hint: 'Send at least one photo.' };
          }
          return { type: 'advance', fields };
        }
        return { type: 'reject', hint: `Send a photo or press “${LABELS.done}”.` };
      },
    },
  ];

  return {
    kind: 'materials',
    parent: 'menu',
    requiresRow: true,
    intro: () => `${SECTION_TITLES.materials}\n\nPVD film, PVC tubes, tape and photos of what was used.`,
    initialFields: () => ({ pvdMeters: null, pvcTubes: null, tape: null, photos: [] }),
    loadReferences: async ({ row }) => {
      if (row === null) {
        throw new DialogueBindingError('Materials dialogue without a shift row');
      }
      const progress = await records.readProgress(row);
      return { shiftDate: progress.shiftDate };
    },
    steps,
    review: (fields) =>
      [
        SECTION_TITLES.materials,
        '',
        `PVD film: ${fields.pvdMeters ?? 0} m`,
        `PVC tubes: ${fields.pvcTubes ?? 0} pcs`,
        `Tape: ${fields.tape ?? 0} pcs`,
        `Photos: ${fields.photos.length}`,
      ].join('\n'),
    missing: (fields) => {
      if (fields.pvdMeters === null || fields.pvcTubes === null || fields.tape === null) {
        return `Some answers are missing. Press “${LABELS.edit}” to fill them in.`;
      }
      return fields.photos.length === 0 ? 'Send at least one photo.' : null;
    },
    savingText: '⏳ Saving photos and materials…',
    persist: async (fields, references, binding) => {
      if (binding.row === null) {
        throw new DialogueBindingError('Materials save without a shift row');
      }
      const folder = await files.ensureDatedFolder(references.shiftDate);
      const uploaded: string[] = [];
      for (const [index, photo] of fields.photos.entries()) {
        const file = await chat.download(photo.fileReference);
        const name = await uploadWithFreeName(files, folder, file.content, {
          timeLabel: photo.timeLabel,
          userId: binding.userId,
          ordinal: index + 1,
          extension: file.extension || DEFAULT_EXTENSION,
        });
        uploaded.push(name);
      }
      const photosLink = await files.publishLink(folder);
      logger.info(
        `[materials] Uploaded ${uploaded.length} photo(s) to ${folder.title} (userId=${binding.userId}, row=${binding.row})`,
      );
      await records.writeSection(binding.row, {
        section: 'materials',
        record: {
          pvdMeters: fields.pvdMeters ?? 0,
          pvcTubes: fields.pvcTubes ?? 0,
          tape: fields.tape ?? 0,
          photosLink,
        },
      });
    },
  };
};
