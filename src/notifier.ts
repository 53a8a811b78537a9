import { FormPoster } from './http.js';
import { Logger, MonitorConfig } from './types.js';

export const PUSHOVER_ENDPOINT = 'https://api.pushover.net/1/messages.json';

export interface Notifier {
  notify(message: string): Promise<void>;
}

export class PushoverNotifier implements Notifier {
  constructor(
    private http: FormPoster,
    private opts: MonitorConfig['pushover'],
    private logger: Logger = console
  ) {}

  // Best effort: failures are logged, never thrown.
  async notify(message: string): Promise<void> {
    const { userKey, appToken, title } = this.opts;
    if (!userKey || !appToken) {
      this.logger.log('[notify] Pushover keys missing, no notification sent.');
      return;
    }

    try {
      const res = await this.http.postForm(PUSHOVER_ENDPOINT, {
        token: appToken,
        user: userKey,
        title,
        message
      });
      if (res.statusCode === 200) {
        this.logger.log('[notify] Pushover notification sent.');
      } else {
        this.logger.error(`[notify] Pushover failed: ${res.statusCode} ${res.body}`);
      }
    } catch (err) {
      this.logger.error(`[notify] Pushover request failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
