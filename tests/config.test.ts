import assert from "node:assert/strict";
import { describe, it } from "node:test";
import path from "node:path";
import { daemonStatePath, loadStatsConfig } from "../src/index.js";

describe("loadStatsConfig", () => {
  it("環境変数が無い場合はインストールディレクトリ配下を使う", () => {
    const config = loadStatsConfig({});
    assert.deepEqual(config, {
      installDir: "/var/ossec",
      statsDir: "/var/ossec/stats",
      socketsDir: "/var/ossec/queue/sockets",
      dateFormat: "yyyy-MM-dd'T'HH:mm:ss'Z'",
      socketTimeoutMs: null,
    });
  });

  it("インストールディレクトリから派生パスを組み立てる", () => {
    const config = loadStatsConfig({ HOST_STATS_INSTALL_DIR: "/opt/manager" });
    assert.equal(config.statsDir, "/opt/manager/stats");
    assert.equal(config.socketsDir, "/opt/manager/queue/sockets");
  });

  it("個別の上書きを優先する", () => {
    const config = loadStatsConfig({
      HOST_STATS_DIR: "relative/stats",
      HOST_STATS_SOCKETS_DIR: "/run/sockets",
      HOST_STATS_DATE_FORMAT: "dd/MM/yyyy",
      HOST_STATS_SOCKET_TIMEOUT_MS: "1500",
    });
    assert.equal(config.statsDir, path.resolve("relative/stats"));
    assert.equal(config.socketsDir, "/run/sockets");
    assert.equal(config.dateFormat, "dd/MM/yyyy");
    assert.equal(config.socketTimeoutMs, 1500);
  });

  it("不正な日付フォーマットは読み込み時にRangeError", () => {
    assert.throws(() => loadStatsConfig({ HOST_STATS_DATE_FORMAT: "yyyy-MM-dd jj" }), RangeError);
  });

  it("不正なタイムアウトは無視する", () => {
    assert.equal(loadStatsConfig({ HOST_STATS_SOCKET_TIMEOUT_MS: "abc" }).socketTimeoutMs, null);
    assert.equal(loadStatsConfig({ HOST_STATS_SOCKET_TIMEOUT_MS: "0" }).socketTimeoutMs, null);
  });
});

describe("daemonStatePath", () => {
  it("var/run/<daemon>.state を返す", () => {
    assert.equal(
      daemonStatePath("/var/ossec", "wazuh-analysisd"),
      "/var/ossec/var/run/wazuh-analysisd.state"
    );
  });
});
