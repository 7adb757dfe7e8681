import { describe, expect, it } from "vitest";
import { isSymbolMentioned, symbolDomain } from "./symbol-filter.js";

describe("symbol mention filter", () => {
  it("matches crypto aliases case-insensitively", () => {
    expect(isSymbolMentioned("bitcoin ETF flows hit a record", "BTC-USD")).toBe(true);
    expect(isSymbolMentioned("Ethereum upgrade ships", "BTC-USD")).toBe(false);
    expect(isSymbolMentioned("ETH staking yields fall", "ETH")).toBe(true);
  });

  it("lets unconfigured crypto pairs through", () => {
    expect(isSymbolMentioned("Fed holds rates", "DOGE-USD")).toBe(true);
  });

  it("requires a configured alias for teams", () => {
    expect(isSymbolMentioned("Patrick  Mahomes throws four touchdowns", "NFL:KC_CHIEFS")).toBe(true);
    expect(isSymbolMentioned("Cowboys sign a kicker", "NFL:KC_CHIEFS")).toBe(false);
    expect(isSymbolMentioned("Jets sign a kicker", "NFL:NY_JETS")).toBe(false);
  });

  it("uses whole-word matching for other tickers", () => {
    expect(isSymbolMentioned("NVDA guides above consensus", "NVDA")).toBe(true);
    expect(isSymbolMentioned("NVDAX fund rebalances", "NVDA")).toBe(false);
    expect(isSymbolMentioned("", "NVDA")).toBe(false);
  });

  it("classifies symbol domains", () => {
    expect(symbolDomain("NFL:DAL_COWBOYS")).toBe("sports");
    expect(symbolDomain("SOL")).toBe("crypto");
    expect(symbolDomain("TSLA")).toBe("generic");
  });
});
