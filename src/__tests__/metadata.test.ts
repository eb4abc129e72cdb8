import { InvalidConfigurationError } from "../errors";
import { metadataBonus, parseMetadataBoosts, parseMetadataValue, type MetadataBoost } from "../metadata";

describe("parseMetadataValue", () => {
  it("types booleans and numbers", () => {
    expect(parseMetadataValue("3")).toBe(3);
    expect(parseMetadataValue("-1.5")).toBe(-1.5);
    expect(parseMetadataValue("true")).toBe(true);
    expect(parseMetadataValue("v2")).toBe("v2");
  });
});

describe("parseMetadataBoosts", () => {
  it("reads equality and lower-bound rules", () => {
    expect(parseMetadataBoosts("importance=high:0.2,content_type=article:0.1, year>=2019:0.1,")).toEqual([
      { key: "importance", equals: "high", bonus: 0.2 },
      { key: "content_type", equals: "article", bonus: 0.1 },
      { key: "year", atLeast: 2019, bonus: 0.1 },
    ]);
    expect(parseMetadataBoosts("draft=false:-0.5")).toEqual([{ key: "draft", equals: false, bonus: -0.5 }]);
    expect(parseMetadataBoosts("  ")).toEqual([]);
  });

  it("splits the bonus at the last colon", () => {
    expect(parseMetadataBoosts("time=10:30:0.3")).toEqual([{ key: "time", equals: "10:30", bonus: 0.3 }]);
  });

  it("rejects malformed rules", () => {
    expect(() => parseMetadataBoosts("importance")).toThrow(InvalidConfigurationError);
    expect(() => parseMetadataBoosts("year>=recent:0.1")).toThrow(
      'metadata boost "year>=recent:0.1" needs a number after >=',
    );
  });
});

describe("metadataBonus", () => {
  const boosts: MetadataBoost[] = [
    { key: "importance", equals: "high", bonus: 0.2 },
    { key: "year", atLeast: 2019, bonus: 0.1 },
  ];

  it("adds the bonus of every matching rule", () => {
    expect(metadataBonus({ importance: "high", year: 2021 }, boosts)).toBeCloseTo(0.3);
    expect(metadataBonus({ importance: "high", year: "2019" }, boosts)).toBeCloseTo(0.3);
    expect(metadataBonus({ importance: "low", year: 2018 }, boosts)).toBe(0);
    expect(metadataBonus({ year: "recent" }, boosts)).toBe(0);
    expect(metadataBonus({}, [])).toBe(0);
  });
});
