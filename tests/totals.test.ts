import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { StatsUserError } from "../src/core/errors.js";
import { splitLines } from "../src/io/lineReader.js";
import {
  TotalsReader,
  parseTotalsLine,
  parseTotalsLog,
  totalsLogPath,
} from "../src/stats/totals.js";

const WELL_FORMED = [
  "0-1002-2-4",
  "0-5501-3-1",
  "0--12--340--1--0",
  "",
  "1-530-7-2",
  "1--3--98--0--2",
  "2--0--15--0--0",
].join("\n");

describe("parseTotalsLine", () => {
  it("4フィールドの行はアラート", () => {
    assert.deepEqual(parseTotalsLine("3-1002-5-2\n"), {
      kind: "alert",
      alert: { sigid: 1002, level: 5, times: 2 },
    });
  });

  it("5フィールドの行は時間単位の集計", () => {
    assert.deepEqual(parseTotalsLine("7--20--410--3--1\n"), {
      kind: "hour",
      record: { hour: 7, totalAlerts: 20, events: 410, syscheck: 3, firewall: 1 },
    });
  });

  it("空行は読み飛ばす", () => {
    assert.deepEqual(parseTotalsLine("\n"), { kind: "skip" });
    assert.deepEqual(parseTotalsLine("header"), { kind: "skip" });
  });

  it("フィールド数が合わない行は不正", () => {
    assert.deepEqual(parseTotalsLine("1--2--3\n"), { kind: "malformed", line: "1--2--3\n" });
    assert.equal(parseTotalsLine("1--2--3--4--5--6").kind, "malformed");
  });

  it("数値でないフィールドも不正", () => {
    assert.equal(parseTotalsLine("0-x-2-3").kind, "malformed");
    assert.equal(parseTotalsLine("1--a--3--4--5").kind, "malformed");
  });
});

describe("parseTotalsLog", () => {
  it("締め行ごとに直前のアラートをまとめる", () => {
    const result = parseTotalsLog(splitLines(WELL_FORMED));
    assert.equal(result.failed, false);
    assert.deepEqual(result.records, [
      {
        hour: 0,
        alerts: [
          { sigid: 1002, level: 2, times: 4 },
          { sigid: 5501, level: 3, times: 1 },
        ],
        totalAlerts: 12,
        events: 340,
        syscheck: 1,
        firewall: 0,
      },
      {
        hour: 1,
        alerts: [{ sigid: 530, level: 7, times: 2 }],
        totalAlerts: 3,
        events: 98,
        syscheck: 0,
        firewall: 2,
      },
      { hour: 2, alerts: [], totalAlerts: 0, events: 15, syscheck: 0, firewall: 0 },
    ]);
  });

  it("不正な行で止まりそれまでの結果を返す", () => {
    const lines = splitLines("0-1002-2-4\n0--1--10--0--0\n1-530-7-2\n1--2--3\n2--0--15--0--0\n");
    const result = parseTotalsLog(lines);
    assert.equal(result.failed, true);
    assert.equal(result.records.length, 1);
    assert.equal(result.records[0]?.hour, 0);
    assert.deepEqual(result.records[0]?.alerts, [{ sigid: 1002, level: 2, times: 4 }]);
  });

  it("締め行の無い末尾アラートは捨てる", () => {
    const result = parseTotalsLog(splitLines("0--1--10--0--0\n1-530-7-2\n1-531-3-1\n"));
    assert.equal(result.failed, false);
    assert.equal(result.records.length, 1);
    assert.deepEqual(result.records[0]?.alerts, []);
  });
});

describe("TotalsReader", () => {
  let statsDir: string;

  beforeEach(async () => {
    statsDir = await mkdtemp(join(tmpdir(), "host-stats-totals-"));
  });

  afterEach(async () => {
    await rm(statsDir, { recursive: true, force: true });
  });

  it("年/月名/日付のパスを組み立てる", () => {
    assert.equal(
      totalsLogPath("/stats", new Date(2021, 0, 5)),
      join("/stats", "totals", "2021", "Jan", "ossec-totals-05.log")
    );
  });

  it("指定日のログを解析する", async () => {
    const dir = join(statsDir, "totals", "2021", "Mar");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "ossec-totals-09.log"), `${WELL_FORMED}\n`);

    const result = await new TotalsReader({ statsDir }).totals(new Date(2021, 2, 9));
    assert.equal(result.failed, false);
    assert.deepEqual(
      result.records.map((record) => record.hour),
      [0, 1, 2]
    );
  });

  it("ログが無い場合はパス付きで失敗する", async () => {
    const date = new Date(2021, 11, 31);
    await assert.rejects(new TotalsReader({ statsDir }).totals(date), (err: unknown) => {
      assert.ok(err instanceof StatsUserError);
      assert.equal(err.code, 1308);
      assert.equal(err.extraMessage, totalsLogPath(statsDir, date));
      return true;
    });
  });
});
