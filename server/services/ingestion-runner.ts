/**
 * INGESTION RUNNER
 *
 * One run: crawl the last N publication dates (yesterday backwards, one at a
 * time), segment every page, extract all blocks in one batch, merge into the
 * store, and keep a RunLog of it all.
 *
 * - A date that cannot be fetched is logged and skipped
 * - Store outages and unexpected errors fail the run (RunLog → failed)
 * - The browser session is closed on every exit path
 * - One run at a time per runner
 */

import type { RawListingBlock } from '@shared/types/pipeline';
import { errorMessage, FetchError, RunFailure, RunInProgressError } from '../errors';
import type { IStorage } from '../storage';
import type { BrowserNavigator, PageFetch } from './browser-navigator';
import type { ExtractionStrategy, FieldExtractor } from './field-extractor';
import { contentHashIdentity, type IdentityStrategy } from './listing-identity';
import type { ListingMerger } from './listing-merger';
import { pageToText, segmentListings } from './listing-segmenter';
import { RunStateMachine } from './run-state';
import { shiftDays, sleep, todayIsoDate } from './scraper-utils';

export type RunSummary =
  | {
      status: 'completed';
      runId: number;
      found: number;
      new: number;
      updated: number;
      failed: number;
      datesFetched: number;
      datesSkipped: number;
      extraction: ExtractionStrategy;
    }
  | {
      status: 'failed';
      runId: number;
      error: string;
    };

export interface IngestionRunnerDeps {
  storage: IStorage;
  navigator: BrowserNavigator;
  extractor: Pick<FieldExtractor, 'extractWithStrategy'>;
  merger: Pick<ListingMerger, 'mergeAll'>;
  identity?: IdentityStrategy;
  dateDelayMs?: number;
  defaultDaysBack?: number;
  today?: () => string;
}

interface CrawlResult {
  blocks: RawListingBlock[];
  datesFetched: number;
  datesSkipped: number;
}

/** Publication dates for a run on `runDate`: yesterday, the day before, … */
export function crawlDates(runDate: string, daysBack: number): string[] {
  return Array.from({ length: daysBack }, (_, i) => shiftDays(runDate, -(i + 1)));
}

export class IngestionRunner {
  private running = false;
  private lastState: RunStateMachine | null = null;

  constructor(private deps: IngestionRunnerDeps) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** State machine of the current (or most recent) run. */
  get state(): RunStateMachine | null {
    return this.lastState;
  }

  /**
   * Throws RunInProgressError when a run is already going, and RunFailure
   * only when the RunLog itself cannot be written. Every other failure is
   * reported in the returned summary.
   */
  async runIngestion(daysBack: number = this.deps.defaultDaysBack ?? 7): Promise<RunSummary> {
    if (!Number.isInteger(daysBack) || daysBack < 1) {
      throw new RangeError(`daysBack must be a positive integer, got ${daysBack}`);
    }
    if (this.running) {
      throw new RunInProgressError();
    }

    this.running = true;
    try {
      return await this.execute(daysBack);
    } finally {
      this.running = false;
    }
  }

  private async execute(daysBack: number): Promise<RunSummary> {
    const { storage } = this.deps;
    const runDate = (this.deps.today ?? todayIsoDate)();
    const machine = new RunStateMachine();
    this.lastState = machine;

    let runId: number;
    try {
      const run = await storage.createRunLog({ days_back: daysBack, status: 'running', started_at: new Date() });
      runId = run.id;
    } catch (error) {
      throw new RunFailure(`Could not record run start: ${errorMessage(error)}`, { cause: error });
    }

    console.log(`[INGEST] 🚀 Run ${runId} started (${daysBack} days back from ${runDate})`);

    try {
      await storage.healthCheck();

      const crawl = await this.crawl(machine, runDate, daysBack);

      machine.transition('merging');
      const extraction = await this.deps.extractor.extractWithStrategy(crawl.blocks);
      const merged = await this.deps.merger.mergeAll(
        crawl.blocks.map((block, i) => ({ block, fields: extraction.fields[i] })),
        runDate
      );

      await storage.updateRunLog(runId, {
        status: 'completed',
        finished_at: new Date(),
        listings_found: crawl.blocks.length,
        listings_new: merged.created,
        listings_updated: merged.resighted,
      });
      machine.transition('completed');

      console.log(
        `[INGEST] ✅ Run ${runId} completed: ${crawl.blocks.length} found, ${merged.created} new, ${merged.resighted} updated, ${merged.failed} failed`
      );

      return {
        status: 'completed',
        runId,
        found: crawl.blocks.length,
        new: merged.created,
        updated: merged.resighted,
        failed: merged.failed,
        datesFetched: crawl.datesFetched,
        datesSkipped: crawl.datesSkipped,
        extraction: extraction.strategy,
      };
    } catch (error) {
      const message = errorMessage(error);
      if (!machine.isTerminal) machine.transition('failed');
      console.error(`[INGEST] ❌ Run ${runId} failed:`, error);

      try {
        await storage.updateRunLog(runId, { status: 'failed', finished_at: new Date(), error_message: message });
      } catch (logError) {
        throw new RunFailure(`Run ${runId} failed (${message}) and its run log could not be updated: ${errorMessage(logError)}`, { cause: logError });
      }

      return { status: 'failed', runId, error: message };
    }
  }

  private async crawl(machine: RunStateMachine, runDate: string, daysBack: number): Promise<CrawlResult> {
    const { navigator } = this.deps;
    const identity = this.deps.identity ?? contentHashIdentity;
    const delayMs = this.deps.dateDelayMs ?? 0;
    const dates = crawlDates(runDate, daysBack);
    const result: CrawlResult = { blocks: [], datesFetched: 0, datesSkipped: 0 };

    try {
      await navigator.open();

      for (const [i, date] of dates.entries()) {
        machine.transition('navigating_date');

        const page = await this.fetchDate(date);
        if (page === null) {
          result.datesSkipped++;
        } else {
          machine.transition('parsing_date');
          result.datesFetched++;

          if (page.kind === 'markup') {
            const blocks = segmentListings(pageToText(page.html), date, identity);
            console.log(`[SEGMENTER] ${date}: ${blocks.length} listings`);
            result.blocks.push(...blocks);
          } else {
            console.log(`[INGEST] No listings for ${date}`);
          }
        }

        if (i < dates.length - 1 && delayMs > 0) {
          await sleep(delayMs);
        }
      }
    } finally {
      await this.closeNavigator();
    }

    return result;
  }

  // FetchError → null (skip the date); anything else fails the run
  private async fetchDate(date: string): Promise<PageFetch | null> {
    try {
      return await this.deps.navigator.fetchPage(date);
    } catch (error) {
      if (error instanceof FetchError) {
        console.error(`[INGEST] ⚠️ ${error.message}, skipping date`);
        return null;
      }
      throw error;
    }
  }

  private async closeNavigator(): Promise<void> {
    try {
      await this.deps.navigator.close();
    } catch (error) {
      console.error(`[NAVIGATOR] ⚠️ Failed to close browser session: ${errorMessage(error)}`);
    }
  }
}
