import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { StatsInternalError } from "../core/errors.js";
import { WEEK_DAYS } from "../core/stats.js";
import type { DayAverage, HourlyAverage, WeeklyAverage } from "../core/stats.js";
import { parseIntStrict } from "../io/lineReader.js";

const HOURS_PER_DAY = 24;
const INTERACTIONS_FILE = String(HOURS_PER_DAY);

type AverageReaderOptions = {
  statsDir: string;
};

type ErrnoLike = { code?: string };

export class AverageReader {
  constructor(private readonly options: AverageReaderOptions) {}

  async hourly(): Promise<[HourlyAverage]> {
    const { hours, interactions } = await this.readBuckets(
      join(this.options.statsDir, "hourly-average")
    );
    return [{ averages: hours, interactions }];
  }

  async weekly(): Promise<WeeklyAverage[]> {
    const results: WeeklyAverage[] = [];
    for (const [index, day] of WEEK_DAYS.entries()) {
      const dir = join(this.options.statsDir, "weekly-average", String(index));
      results.push({ [day]: await this.readBuckets(dir) });
    }
    return results;
  }

  private async readBuckets(dir: string): Promise<DayAverage> {
    const hours: number[] = [];
    for (let hour = 0; hour < HOURS_PER_DAY; hour += 1) {
      hours.push(await readBucket(join(dir, String(hour))));
    }
    const interactions = await readBucket(join(dir, INTERACTIONS_FILE));
    return { hours, interactions };
  }
}

async function readBucket(file: string): Promise<number> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (err) {
    // 履歴が溜まる前はファイルが無いのが通常
    if ((err as ErrnoLike)?.code !== "ENOENT") {
      console.warn(`[HostStats] unreadable bucket file ${file}, counting as 0:`, err);
    }
    return 0;
  }
  const value = parseIntStrict(content);
  if (value === null) {
    throw new StatsInternalError(1104, { extraMessage: `${file}: not an integer` });
  }
  return value;
}
