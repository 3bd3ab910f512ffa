/**
 * Schedule sources, in the order the orchestrator tries them.
 */

import type { IScheduleSource } from '../types';
import { config } from '../../config';
import { HtmlScheduleAdapter, type PageFetcher } from './htmlScheduleAdapter';
import { StaticScheduleAdapter } from './staticScheduleAdapter';

export { HtmlScheduleAdapter, type PageFetcher } from './htmlScheduleAdapter';
export { StaticScheduleAdapter } from './staticScheduleAdapter';

export interface SourceSettings {
  primaryUrls: string[];
  secondaryUrls: string[];
  fallbackScheduleFile?: string;
}

export function createScheduleSources(
  settings: SourceSettings = config.sources,
  fetcher?: PageFetcher,
): IScheduleSource[] {
  const sources: IScheduleSource[] = [];
  if (settings.primaryUrls.length > 0) {
    sources.push(new HtmlScheduleAdapter('primary', settings.primaryUrls, fetcher));
  }
  if (settings.secondaryUrls.length > 0) {
    sources.push(new HtmlScheduleAdapter('secondary', settings.secondaryUrls, fetcher));
  }
  if (settings.fallbackScheduleFile) {
    sources.push(new StaticScheduleAdapter(settings.fallbackScheduleFile));
  }
  return sources;
}
