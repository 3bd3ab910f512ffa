import { readFile } from 'node:fs/promises';
import { fallbackScheduleSchema, type FallbackSchedule } from '@shared/schema';
import type { IScheduleSource, RawGameRecord } from '../types';
import { SourceDataError, toError } from '../../types/errors';
import { withSource } from '../../logger';

const log = withSource('source:static');

/**
 * StaticScheduleAdapter
 *
 * Reads a hand-maintained schedule from a versioned JSON asset. Used only
 * after every live source has failed, and still has to pass the validator.
 */
export class StaticScheduleAdapter implements IScheduleSource {
  readonly name = 'static';

  constructor(private readonly filePath: string) {}

  async load(): Promise<FallbackSchedule> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (err) {
      throw new SourceDataError(`Cannot read fallback schedule: ${toError(err).message}`, { file: this.filePath });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new SourceDataError(`Fallback schedule is not valid JSON: ${toError(err).message}`, { file: this.filePath });
    }

    const parsed = fallbackScheduleSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceDataError('Fallback schedule does not match the expected format', {
        file: this.filePath,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  async fetchRecords(): Promise<RawGameRecord[]> {
    const schedule = await this.load();
    log.info({ file: this.filePath, season: schedule.season, count: schedule.games.length }, 'fallback schedule loaded');

    return schedule.games.map((g) => ({
      dateText: g.date,
      timeText: g.time,
      opponentText: g.opponent,
      isHome: g.home,
      locationText: g.location,
      broadcastText: g.broadcast,
    }));
  }
}
