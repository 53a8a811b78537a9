export type LinkSet = Set<string>;

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type MonitorConfig = {
  websiteUrl: string;
  statePath: string;
  userAgent: string;
  timeoutMs: number;
  pushover: {
    userKey?: string;
    appToken?: string;
    title: string;
  };
};

export type RunStatus = 'fetch-failed' | 'no-links-found' | 'no-new-links' | 'new-links-notified';

export type RunOutcome = {
  status: RunStatus;
  current: string[]; // sorted links seen on this run
  added: string[]; // sorted links absent from the previous state
};
