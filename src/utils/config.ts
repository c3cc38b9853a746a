import path from 'path';
import { fileURLToPath } from 'url';
import { Config, NumericDateOrder } from '../types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function envDateOrder(): NumericDateOrder {
  return process.env.LMS_NUMERIC_DATE_ORDER?.toUpperCase() === 'MDY' ? 'MDY' : 'DMY';
}

const dataDir = process.env.DATA_DIR || path.join(projectRoot, 'data');

export const config: Config = {
  portal: {
    baseUrl: process.env.LMS_BASE_URL || 'https://letus.ed.tus.ac.jp',
    dashboardPath: process.env.LMS_DASHBOARD_PATH || '/my/',
    timezone: process.env.LMS_TIMEZONE || 'Asia/Tokyo',
    numericDateOrder: envDateOrder(),
    navigationTimeout: envNumber('LMS_NAV_TIMEOUT_MS', 30000),
    headless: process.env.LMS_HEADLESS !== 'false',
    selectors: {
      listing: ['[data-region="timeline"]', '[data-region="event-list-container"]'],
      item: ['[data-region="timeline-item"]', '[data-region="event-list-item"]'],
      title: ['[data-region="event-name"]', '.event-name', 'h6 a', 'a'],
      course: ['[data-region="course-name"]', '.event-name-container small', '.course-name'],
      due: ['time[datetime]', '[data-region="event-due"]', '.event-due', 'time'],
      link: ['[data-region="event-name"] a', 'a[href]'],
      dateGroup: ['[data-region="event-list-content-date-group"]', '[data-region="date-group"]'],
      dateHeading: ['[data-region="event-list-content-date"]', 'h5'],
    },
    login: {
      loginLink: 'a:has-text("Log in"), a:has-text("ログイン")',
      username: 'input[name="j_username"], input[name="username"]',
      password: 'input[name="j_password"], input[name="password"]',
    },
    loginErrorMarkers: ['ログインエラー', 'Invalid login', 'ユーザ名またはパスワードが正しくありません'],
    loginUrlMarkers: ['/login', '/idp/', 'adfs', 'Shibboleth.sso'],
    submittedMarkers: ['提出済', 'Submitted for grading'],
  },
  notify: {
    url: process.env.NOTIFY_URL || undefined,
    timeout: envNumber('NOTIFY_TIMEOUT_MS', 10000),
  },
  check: {
    dueWithinHours: 48,
    watchIntervalMinutes: 60,
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  paths: {
    dataDir,
    secrets: path.join(dataDir, 'secrets.json'),
    logFile: path.join(dataDir, 'checker.log'),
  },
};
