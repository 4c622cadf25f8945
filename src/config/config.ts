import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

export interface AdminSettings {
  telegramChatId: number;
  email: string;
  phoneNumber: number;
}

// Функция для получения актуальных значений из env
export function getEnvValue(key: string, defaultValue: string = ''): string {
  return process.env[key] || defaultValue;
}

export const config = {
  database: {
    path: getEnvValue('DATABASE_PATH') || path.join(process.cwd(), 'data', 'bot.db'),
    verbose: getEnvValue('DB_VERBOSE', 'false').toLowerCase() === 'true',
  },
};

function parseInteger(key: string): number {
  const raw = getEnvValue(key).trim();
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${key} must be an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`${key} is outside the safe integer range: ${raw}`);
  }
  return value;
}

/**
 * Admin defaults read from env at call time. Missing or non-numeric values throw.
 */
export function getAdminSettings(): AdminSettings {
  const email = getEnvValue('EMAIL_ADMIN').trim();
  if (!email) {
    throw new Error('EMAIL_ADMIN is not set');
  }
  return {
    telegramChatId: parseInteger('TELEGRAM_CHAT_ID_ADMIN'),
    email,
    phoneNumber: parseInteger('PHONE_ADMIN'),
  };
}
