import { Notifier } from './notifier.js';
import { LinkSet, Logger, RunOutcome } from './types.js';
import { difference, sortedLinks } from './utils.js';

export const MESSAGE_HEADING = 'Neue PDFs entdeckt:';

type MonitorDeps = {
  websiteUrl: string;
  extractor: { extract(url: string): Promise<LinkSet> };
  store: { load(): LinkSet; save(links: LinkSet): void };
  notifier: Notifier;
  logger?: Logger;
};

export function formatMessage(added: string[]): string {
  return [MESSAGE_HEADING, ...added].join('\n');
}

export class Monitor {
  private logger: Logger;

  constructor(private deps: MonitorDeps) {
    this.logger = deps.logger ?? console;
  }

  async run(): Promise<RunOutcome> {
    const { websiteUrl, extractor, store, notifier } = this.deps;
    this.logger.log(`[monitor] checking ${websiteUrl}`);

    let current: LinkSet;
    try {
      current = await extractor.extract(websiteUrl);
    } catch (err) {
      // A failed fetch must not look like "no PDFs", so state stays untouched.
      this.logger.error(`[monitor] Error fetching/parsing page: ${err instanceof Error ? err.message : String(err)}`);
      return { status: 'fetch-failed', current: [], added: [] };
    }

    if (current.size === 0) {
      this.logger.log('[monitor] No PDF links on page, state left unchanged.');
      return { status: 'no-links-found', current: [], added: [] };
    }
    const currentSorted = sortedLinks(current);

    const old = store.load();
    const added = sortedLinks(difference(current, old));

    if (added.length === 0) {
      this.logger.log('[monitor] No new PDFs found.');
      return { status: 'no-new-links', current: currentSorted, added };
    }

    await notifier.notify(formatMessage(added));
    // Saved even when the notification failed; these links will not be reported again.
    store.save(current);
    this.logger.log(`[monitor] New PDFs found:\n${added.map((l) => `- ${l}`).join('\n')}`);
    return { status: 'new-links-notified', current: currentSorted, added };
  }
}
