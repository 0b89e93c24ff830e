import { FakeChatPlatform } from '../../../__tests__/support/fakeChatPlatform';
import { FakeFileStore } from '../../../__tests__/support/fakeFileStore';
import { FakeRecordStore } from '../../../__tests__/support/fakeRecordStore';
import AuthorizationError from '../../../errors/AuthorizationError';
import ExternalServiceError from '../../../errors/ExternalServiceError';
import { AUTHORIZATION_FAILURE_TEXT } from '../../../errors/userMessages';
import type { FileStore } from '../../../services/fileStore';
import { ACTIONS, LABELS, SKIP_TOKEN } from '../../labels';
import type { WizardBinding, WizardInput } from '../../wizard/types';
import { WizardEngine } from '../../wizard/wizardEngine';
import { createMaterialsWizard, photoFileName, uploadWithFreeName } from '../materialsWizard';

const SENT_AT = new Date('2026-10-19T07:08:09Z');

let nextMessageId = 3000;
const text = (value: string): WizardInput => {
  nextMessageId += 1;
  return { kind: 'text', text: value, messageId: nextMessageId };
};
const photo = (fileReference: string): WizardInput => {
  nextMessageId += 1;
  return { kind: 'photo', fileReference, sentAt: SENT_AT, messageId: nextMessageId };
};

describe('materials wizard', () => {
  let chat: FakeChatPlatform;
  let records: FakeRecordStore;
  let files: FakeFileStore;
  let engine: WizardEngine;
  let binding: WizardBinding;

  const fillUpToConfirm = async () => {
    const definition = createMaterialsWizard({ records, files, chat, timezone: 'UTC' });
    const context = await engine.start(definition, binding);
    const inputs: WizardInput[] = [
      { kind: 'action', data: ACTIONS.start, messageId: null },
      text('120'),
      text(SKIP_TOKEN),
      text('4'),
      photo('file-a'),
      photo('file-b'),
      text(LABELS.done),
    ];
    for (const input of inputs) {
      await engine.handle(definition, context, input, binding.userId);
    }
    return { definition, context };
  };

  beforeEach(async () => {
    chat = new FakeChatPlatform();
    chat.files.set('file-a', { content: Buffer.from('a'), extension: '.jpg' });
    chat.files.set('file-b', { content: Buffer.from('b'), extension: '' });
    records = new FakeRecordStore();
    files = new FakeFileStore();
    engine = new WizardEngine(chat);
    binding = { userId: 1, chatId: 1, row: await records.openRow(1) };
  });

  it('collects counts and photos before the review', async () => {
    const { context } = await fillUpToConfirm();

    expect(context.position).toEqual({ kind: 'confirm' });
    expect(context.fields).toEqual({
      pvdMeters: 120,
      pvcTubes: 0,
      tape: 4,
      photos: [
        { fileReference: 'file-a', timeLabel: '070809' },
        { fileReference: 'file-b', timeLabel: '070809' },
      ],
    });
  });

  it('moves to the next free ordinal when a name is taken', async () => {
    files.existing.add('2026-10-19/070809_1_01.jpg');
    const { definition, context } = await fillUpToConfirm();

    const turn = await engine.handle(definition, context, text(LABELS.confirm), binding.userId);

    expect(turn.status).toBe('saved');
    expect(files.folders).toEqual(['2026-10-19']);
    expect(files.attempts).toEqual(['070809_1_01.jpg', '070809_1_02.jpg', '070809_1_02.jpg', '070809_1_03.jpg']);
    expect(records.writes).toEqual([
      {
        row: binding.row,
        write: {
          section: 'materials',
          record: { pvdMeters: 120, pvcTubes: 0, tape: 4, photosLink: 'https://files.example.test/folder-2026-10-19' },
        },
      },
    ]);
  });

  it('tells the user the upload is running and removes the notice once saved', async () => {
    const { definition, context } = await fillUpToConfirm();
    chat.clear();

    await engine.handle(definition, context, text(LABELS.confirm), binding.userId);

    expect(chat.sent.map((message) => message.text)).toEqual(['⏳ Saving photos and materials…']);
    expect(chat.deleted).toContain(chat.sent[0].messageId);
  });

  it('keeps the review open when storage rejects the credentials', async () => {
    files.failWith = new AuthorizationError('drive.files.list', 'forbidden', { status: 403 });
    const { definition, context } = await fillUpToConfirm();

    const turn = await engine.handle(definition, context, text(LABELS.confirm), binding.userId);

    expect(turn.status).toBe('active');
    expect(context.position).toEqual({ kind: 'confirm' });
    expect(chat.lastSent().text).toBe(AUTHORIZATION_FAILURE_TEXT);
    expect(records.writes).toEqual([]);
  });

  it('requires at least one photo and can drop the last one', async () => {
    const definition = createMaterialsWizard({ records, files, chat, timezone: 'UTC' });
    const context = await engine.start(definition, binding);
    const inputs: WizardInput[] = [
      { kind: 'action', data: ACTIONS.start, messageId: null },
      text('1'),
      text('2'),
      text('3'),
      text(LABELS.done),
    ];
    for (const input of inputs) {
      await engine.handle(definition, context, input, binding.userId);
    }
    expect(context.position).toEqual({ kind: 'step', stepId: 'photos' });
    expect(chat.lastSent().text.startsWith('Send at least one photo.')).toBe(true);

    await engine.handle(definition, context, photo('file-a'), binding.userId);
    expect(chat.lastSent().text.startsWith('📸 Photo 1 added.')).toBe(true);

    await engine.handle(definition, context, text(LABELS.deleteLastPhoto), binding.userId);
    expect(context.fields.photos).toEqual([]);
  });
});

describe('photo file names', () => {
  const folder = { id: 'folder-1', title: '2026-10-19' };

  it('pads the ordinal', () => {
    expect(photoFileName('070809', 42, 3, '.png')).toBe('070809_42_03.png');
  });

  it('gives up after 99 taken names', async () => {
    const upload = jest.fn<ReturnType<FileStore['upload']>, Parameters<FileStore['upload']>>(
      async (_content, name) => ({ status: 'conflict', name }),
    );
    const store: FileStore = {
      ensureDatedFolder: async () => folder,
      upload,
      publishLink: async () => 'https://files.example.test/folder-1',
    };

    await expect(
      uploadWithFreeName(store, folder, Buffer.from('x'), { timeLabel: '070809', userId: 42, ordinal: 1, extension: '.jpg' }),
    ).rejects.toBeInstanceOf(ExternalServiceError);
    expect(upload).toHaveBeenCalledTimes(99);
    expect(upload.mock.calls[98][1]).toBe('070809_42_99.jpg');
  });
});
