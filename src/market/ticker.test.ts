import { InputError } from "../reporting/domain/errors";
import { matchMarket, normalizeTicker, parseTicker } from "./ticker";

describe("parseTicker", () => {
  it("accepts bare US symbols and normalises case", () => {
    expect(parseTicker(" aapl ")).toEqual({ symbol: "AAPL", market: "US" });
  });

  it("accepts share-class suffixes on US symbols", () => {
    expect(parseTicker("BRK.B").market).toBe("US");
    expect(parseTicker("BRK-B").market).toBe("US");
  });

  it("accepts Hong Kong listings", () => {
    expect(parseTicker("0700.hk")).toEqual({ symbol: "0700.HK", market: "HK" });
  });

  it("maps other exchange suffixes", () => {
    expect(matchMarket("VOD.L")).toBe("LSE");
    expect(matchMarket("SHOP.TO")).toBe("TSX");
    expect(matchMarket("RY.TO")).toBe("TSX");
    expect(parseTicker("vod.l")).toEqual({ symbol: "VOD.L", market: "LSE" });
    expect(matchMarket("7203.T")).toBe("TSE");
    expect(matchMarket("600519.SS")).toBe("SSE");
    expect(matchMarket("000001.SZ")).toBe("SZSE");
  });

  it("rejects empty input", () => {
    expect(() => parseTicker("   ")).toThrow("Ticker is required");
  });

  it("rejects unknown suffixes with an InputError", () => {
    expect(() => parseTicker("AAPL.XX")).toThrow(InputError);
    expect(() => parseTicker("ABC.ZZ")).toThrow(InputError);
    expect(() => parseTicker("BRK.Q")).toThrow(InputError);
    expect(() => parseTicker("TOOLONGSYMBOL")).toThrow(InputError);
    expect(() => parseTicker("12.HK")).toThrow(InputError);
  });

  it("normalizeTicker trims and upper-cases", () => {
    expect(normalizeTicker("  msft\n")).toBe("MSFT");
  });
});
