// backend/services/market/test/views.pillars.spec.ts
import { describe, it, expect } from "vitest";
import { DASH } from "../src/snapshots/format";
import { DatasetKeys } from "../src/snapshots/types";
import { buildPillars, stanceOf } from "../src/views/pillars";
import { normalizeSymbol } from "../src/views/signals";
import { seedBearishBtc } from "./fixtures/snapshots";
import { FakeSnapshotStore } from "./helpers/FakeSnapshotStore";

describe("buildPillars", () => {
  it("fills all six pillars from a full BTC snapshot set", async () => {
    const store = seedBearishBtc(new FakeSnapshotStore());
    const { view, sources } = await buildPillars(store, "BTC");

    expect(sources).toBe(6);
    expect(view.symbol).toBe("BTC");
    expect(view.pillars).toEqual([
      {
        key: "flow",
        label: "Flow",
        value: "$150.0M liqs / $98.7B vol",
        status: "positive",
        hint: "pressure proxy (liqs/volume)",
      },
      {
        key: "leverage",
        label: "Leverage",
        value: "$31.5B OI • +0.118% funding",
        status: "positive",
        hint: "OI + funding stress",
      },
      {
        key: "fragility",
        label: "Fragility",
        value: "+75% long / +25% short",
        status: "positive",
        hint: "liq imbalance + spikes",
      },
      {
        key: "momentum",
        label: "Momentum",
        value: "$68,819 • -2.06% 24h",
        status: "negative",
        hint: "trend + volatility",
      },
      {
        key: "sentiment",
        label: "Sentiment",
        value: "22 — Extreme Fear",
        status: "negative",
        hint: "fear/greed index",
      },
      {
        key: "risk",
        label: "Risk",
        value: "OI +2.50% • BTC dom +54.3%",
        status: "positive",
        hint: "regime + confidence",
      },
    ]);
    expect(view.summary).toEqual({
      headline: "BTC SuperCard",
      stance: "cautious",
      confidence: "high",
      notes: [
        "Funding reflects positioning pressure (crowding proxy).",
        "Liquidations help gauge fragility and forced flow.",
        "Sentiment adds a behavioral context layer.",
      ],
    });
  });

  it("degrades pillar by pillar when snapshots are missing", async () => {
    const store = new FakeSnapshotStore().seed(
      DatasetKeys.price("ethereum"),
      { data: { price: 3512.4, change_24h: 1.5 } },
      null
    );
    const { view, sources, latestUpdate } = await buildPillars(store, "ETH");

    expect(sources).toBe(1);
    expect(latestUpdate).toBeNull();
    expect(view.summary.headline).toBe("ETH SuperCard");
    expect(view.summary.confidence).toBe("low");
    expect(view.summary.stance).toBe("risk-on");
    expect(view.summary.notes).toEqual([DASH, DASH, DASH]);

    const momentum = view.pillars.find((p) => p.key === "momentum");
    expect(momentum?.value).toBe("$3,512 • +1.50% 24h");
    expect(momentum?.status).toBe("positive");

    const others = view.pillars.filter((p) => p.key !== "momentum");
    expect(others.map((p) => [p.value, p.status])).toEqual(
      others.map(() => [DASH, "neutral"])
    );
  });
});

describe("stanceOf", () => {
  it("flags crowded longs when funding and long share are both high", () => {
    expect(stanceOf(0.5, 50, 0.12, 72)).toBe("crowded-longs");
  });

  it("stays neutral without a strong signal", () => {
    expect(stanceOf(0.5, 50, 0.01, 50)).toBe("neutral");
    expect(stanceOf(null, null, null, null)).toBe("neutral");
  });
});

describe("normalizeSymbol", () => {
  it("accepts ETH in any case and falls back to BTC", () => {
    expect(normalizeSymbol(" eth ")).toBe("ETH");
    expect(normalizeSymbol("DOGE")).toBe("BTC");
    expect(normalizeSymbol(undefined)).toBe("BTC");
  });
});
