import dotenv from 'dotenv';

const environment = (process.env.NODE_ENV || 'development').trim();
const envFile = environment === 'production' ? '.env.prod' : '.env.dev';
dotenv.config({ path: envFile });

export type BotConfig = {
  environment: string;
  port: number;
  telegramToken: string;
  webhook: { url: string; path: string } | null;
  spreadsheetId: string;
  shiftsSheet: string;
  directorySheet: string;
  google: {
    clientEmail: string;
    privateKey: string;
    driveParentId: string | null;
  };
  groupChatId: number | null;
  groupNotifications: boolean;
  shiftTimezone: string;
};

type Env = Record<string, string | undefined>;

const normalizeEnvValue = (value: string | undefined): string | null => {
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const coerceBoolean = (value: string | undefined, fallback: boolean): boolean => {
  const normalized = normalizeEnvValue(value)?.toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export const coerceChatId = (value: string | undefined): number | null => {
  const normalized = normalizeEnvValue(value);
  if (!normalized || !/^-?\d+$/.test(normalized)) {
    return null;
  }
  return Number.parseInt(normalized, 10);
};

const required = (env: Env, key: string): string => {
  const value = normalizeEnvValue(env[key]);
  if (!value) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
};

export const loadBotConfig = (env: Env = process.env): BotConfig => {
  const webhookUrl = normalizeEnvValue(env.WEBHOOK_URL);
  return {
    environment,
    port: Number.parseInt(env.PORT || '3001', 10),
    telegramToken: required(env, 'TELEGRAM_BOT_TOKEN'),
    webhook: webhookUrl ? { url: webhookUrl, path: normalizeEnvValue(env.WEBHOOK_PATH) ?? '/telegram/webhook' } : null,
    spreadsheetId: required(env, 'SPREADSHEET_ID'),
    shiftsSheet: normalizeEnvValue(env.SHIFTS_SHEET) ?? 'Shifts',
    directorySheet: normalizeEnvValue(env.DIRECTORY_SHEET) ?? 'Directory',
    google: {
      clientEmail: required(env, 'GOOGLE_CLIENT_EMAIL'),
      privateKey: required(env, 'GOOGLE_PRIVATE_KEY').replace(/\\n/g, '\n'),
      driveParentId: normalizeEnvValue(env.GOOGLE_DRIVE_PARENT_ID),
    },
    groupChatId: coerceChatId(env.GROUP_CHAT_ID),
    groupNotifications: coerceBoolean(env.GROUP_NOTIFICATIONS, true),
    shiftTimezone: normalizeEnvValue(env.SHIFT_TZ) ?? 'Europe/Moscow',
  };
};
