import { google } from 'googleapis';
import type { BotConfig } from './env.js';

const { JWT } = google.auth;

const scopes: string[] = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];

// One service-account client shared by the Sheets and Drive stores
export const createGoogleClient = (config: BotConfig['google']) =>
  new JWT({
    email: config.clientEmail,
    key: config.privateKey, // No key file, the key comes from the environment
    scopes,
  });
