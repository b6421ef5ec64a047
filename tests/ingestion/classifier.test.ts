/**
 * エラー分類のテスト
 */

import {
  classifyEvents,
  determineHealth,
  isWithinWindow,
  rankTopErrors,
  selectFailureExamples,
} from "../../src/ingestion/classifier";
import { ValidationError } from "../../src/errors";
import { IngestionEvent } from "../../src/ingestion/types";
import { WINDOW, makeEvent, salesEvents } from "../helpers/fixtures";

const thresholds = { degraded: 0, critical: 0.5 };

function at(iso: string): Date {
  return new Date(iso);
}

describe("determineHealth", () => {
  it("失敗率が critical 閾値を超えたら critical", () => {
    expect(determineHealth(3, 2, "continuous", thresholds)).toBe("critical");
  });

  it("失敗率が critical 閾値と等しい場合は critical にしない", () => {
    expect(determineHealth(2, 1, "continuous", thresholds)).toBe("degraded");
  });

  it("失敗がなければ healthy", () => {
    expect(determineHealth(10, 0, "continuous", thresholds)).toBe("healthy");
  });

  it("critical 閾値 0 なら失敗1件で critical", () => {
    expect(determineHealth(100, 1, "continuous", { degraded: 0, critical: 0 })).toBe("critical");
  });

  it("critical 閾値 1 なら全件失敗でも critical にならない", () => {
    expect(determineHealth(4, 4, "continuous", { degraded: 0, critical: 1 })).toBe("degraded");
  });

  it("degraded 閾値以下の失敗率は healthy", () => {
    expect(determineHealth(10, 1, "continuous", { degraded: 0.2, critical: 0.5 })).toBe("healthy");
  });

  it("イベント0件: continuous は degraded、sparse は healthy", () => {
    expect(determineHealth(0, 0, "continuous", thresholds)).toBe("degraded");
    expect(determineHealth(0, 0, "sparse", thresholds)).toBe("healthy");
  });
});

describe("isWithinWindow", () => {
  it("開始・終了の境界を含む", () => {
    expect(isWithinWindow(WINDOW.start, WINDOW)).toBe(true);
    expect(isWithinWindow(WINDOW.end, WINDOW)).toBe(true);
    expect(isWithinWindow(new Date(WINDOW.start.getTime() - 1), WINDOW)).toBe(false);
    expect(isWithinWindow(new Date(WINDOW.end.getTime() + 1), WINDOW)).toBe(false);
  });
});

describe("rankTopErrors", () => {
  const events: IngestionEvent[] = [
    makeEvent({ status: "failure", errorCode: "E_A", timestamp: at("2024-03-01T11:00:00Z") }),
    makeEvent({ status: "failure", errorCode: "E_B", timestamp: at("2024-03-01T10:00:00Z") }),
    makeEvent({ status: "failure", errorCode: "E_A", timestamp: at("2024-03-01T12:00:00Z") }),
    makeEvent({ status: "warning", errorCode: "E_B", timestamp: at("2024-03-01T13:00:00Z") }),
    makeEvent({ status: "failure", errorCode: "E_C", timestamp: at("2024-03-01T09:00:00Z") }),
    makeEvent({ status: "success", errorCode: "E_C", timestamp: at("2024-03-01T09:30:00Z") }),
    makeEvent({ status: "failure", timestamp: at("2024-03-01T09:45:00Z") }),
  ];

  it("件数の多い順、同数なら最初に出現した順", () => {
    expect(rankTopErrors(events, 5)).toEqual([
      { code: "E_B", count: 2 },
      { code: "E_A", count: 2 },
      { code: "E_C", count: 1 },
    ]);
  });

  it("入力順を入れ替えても結果は同じ", () => {
    const shuffled = [events[3], events[6], events[0], events[5], events[2], events[4], events[1]];
    expect(rankTopErrors(shuffled, 5)).toEqual(rankTopErrors(events, 5));
    expect(rankTopErrors([...events].reverse(), 5)).toEqual(rankTopErrors(events, 5));
  });

  it("同数・同時刻ならコード昇順", () => {
    const t = at("2024-03-01T10:00:00Z");
    const tied = [
      makeEvent({ status: "failure", errorCode: "Z9", timestamp: t }),
      makeEvent({ status: "failure", errorCode: "A1", timestamp: t }),
    ];
    expect(rankTopErrors(tied, 5).map((e) => e.code)).toEqual(["A1", "Z9"]);
  });

  it("上限件数で打ち切る", () => {
    expect(rankTopErrors(events, 1)).toEqual([{ code: "E_B", count: 2 }]);
  });
});

describe("selectFailureExamples", () => {
  it("failure のみを時刻順に上限件数まで返す", () => {
    const examples = selectFailureExamples(
      [
        makeEvent({ status: "failure", sourceId: "late", timestamp: at("2024-03-01T15:00:00Z") }),
        makeEvent({ status: "warning", sourceId: "warn", timestamp: at("2024-03-01T01:00:00Z") }),
        makeEvent({ status: "failure", sourceId: "b", timestamp: at("2024-03-01T05:00:00Z") }),
        makeEvent({ status: "failure", sourceId: "a", timestamp: at("2024-03-01T05:00:00Z") }),
      ],
      2
    );
    expect(examples.map((e) => e.sourceId)).toEqual(["a", "b"]);
    expect(examples[0].samples).toEqual([]);
  });
});

describe("classifyEvents", () => {
  it("sales: success 1件と E1 の failure 2件は critical", () => {
    const [summary] = classifyEvents(salesEvents(), WINDOW, { thresholds });

    expect(summary).toMatchObject({
      datasetId: "sales",
      totalEvents: 3,
      successCount: 1,
      warningCount: 0,
      failureCount: 2,
      recordCount: 10,
      topErrors: [{ code: "E1", count: 2 }],
      status: "critical",
    });
  });

  it("件数の合計は totalEvents と一致する", () => {
    const events = [
      ...salesEvents(),
      makeEvent({ status: "warning" }),
      makeEvent({ datasetId: "orders", status: "failure", errorCode: "E9" }),
      makeEvent({ datasetId: "orders", status: "success" }),
    ];
    for (const s of classifyEvents(events, WINDOW, { thresholds })) {
      expect(s.successCount + s.warningCount + s.failureCount).toBe(s.totalEvents);
    }
  });

  it("ウィンドウ外のイベントは捨てる（境界は含む）", () => {
    const events = [
      makeEvent({ timestamp: WINDOW.start }),
      makeEvent({ timestamp: WINDOW.end }),
      makeEvent({ timestamp: new Date(WINDOW.start.getTime() - 1), status: "failure" }),
      makeEvent({ timestamp: new Date(WINDOW.end.getTime() + 1), status: "failure" }),
    ];
    const [summary] = classifyEvents(events, WINDOW, { thresholds });
    expect(summary.totalEvents).toBe(2);
    expect(summary.status).toBe("healthy");
  });

  it("登録済みデータセットはイベント0件でも集計を返す", () => {
    const summaries = classifyEvents([], WINDOW, {
      thresholds,
      datasets: [
        { id: "b-sparse", expectation: "sparse" },
        { id: "a-continuous", label: "Web", expectation: "continuous" },
      ],
    });
    expect(summaries.map((s) => [s.datasetId, s.status, s.totalEvents])).toEqual([
      ["a-continuous", "degraded", 0],
      ["b-sparse", "healthy", 0],
    ]);
    expect(summaries[0].label).toBe("Web");
    expect(summaries[0].anomalies).toEqual({
      unmappedStatusCount: 0,
      droppedRecordCount: 0,
      unmappedStatusValues: [],
    });
  });

  it("正規化時の異常件数を集計に含める", () => {
    const [summary] = classifyEvents(salesEvents(), WINDOW, {
      thresholds,
      anomalies: {
        sales: { unmappedStatusCount: 1, droppedRecordCount: 2, unmappedStatusValues: ["queued"] },
      },
    });
    expect(summary.anomalies).toEqual({
      unmappedStatusCount: 1,
      droppedRecordCount: 2,
      unmappedStatusValues: ["queued"],
    });
  });

  it("開始が終了より後のウィンドウは ValidationError", () => {
    expect(() =>
      classifyEvents([], { start: WINDOW.end, end: WINDOW.start }, { thresholds })
    ).toThrow(ValidationError);
  });

  it("同じ入力なら入力順によらず同じ結果", () => {
    const events = [...salesEvents(), makeEvent({ datasetId: "orders", status: "failure", errorCode: "E2" })];
    const first = classifyEvents(events, WINDOW, { thresholds });
    const second = classifyEvents([...events].reverse(), WINDOW, { thresholds });
    expect(second).toEqual(first);
    expect(first.map((s) => s.datasetId)).toEqual(["orders", "sales"]);
  });
});
