// Core data types used throughout the application
import type { Dayjs } from 'dayjs';

export interface Credentials {
  username: string;
  password: string;
}

/** Rendered markup of the portal's assignment listing. */
export type RawListingPage = string;

export interface AssignmentRecord {
  title: string;
  course: string;
  dueAt: Dayjs | null;
  sourceText: string;
  url?: string;
}

export type DatedAssignment = AssignmentRecord & { dueAt: Dayjs };

export interface CheckResult {
  due: DatedAssignment[];
  unparseable: AssignmentRecord[];
  unparseableCount: number;
  submittedCount: number;
  total: number;
  windowStart: Dayjs;
  windowEnd: Dayjs;
}

export type NumericDateOrder = 'DMY' | 'MDY';

export interface ListingSelectors {
  listing: string[];
  item: string[];
  title: string[];
  course: string[];
  due: string[];
  link: string[];
  dateGroup: string[];
  dateHeading: string[];
}

export interface LoginSelectors {
  loginLink: string;
  username: string;
  password: string;
}

export interface PortalSettings {
  baseUrl: string;
  dashboardPath: string;
  timezone: string;
  numericDateOrder: NumericDateOrder;
  navigationTimeout: number;
  headless: boolean;
  selectors: ListingSelectors;
  login: LoginSelectors;
  loginErrorMarkers: string[];
  /** URL fragments of login and identity-provider pages. */
  loginUrlMarkers: string[];
  submittedMarkers: string[];
}

export interface NotifySettings {
  url?: string;
  timeout: number;
}

export interface Config {
  portal: PortalSettings;
  notify: NotifySettings;
  check: {
    dueWithinHours: number;
    watchIntervalMinutes: number;
  };
  logging: {
    level: string;
  };
  paths: {
    dataDir: string;
    secrets: string;
    logFile: string;
  };
}
