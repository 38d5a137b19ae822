import { PlaceRecordUtil } from "../../src/services/place-record-util";
import { place } from "../utils/fakes";

describe("PlaceRecordUtil", () => {
  describe("parseStored", () => {
    it("should keep fields it does not know", () => {
      const stored = PlaceRecordUtil.parseStored({
        city: "Lyon",
        state: "Auvergne-Rhône-Alpes",
        country: "France",
        country_code: "FR",
        found: true,
        lat: 45.764,
        lon: 4.8357,
        source: "manual",
      });

      expect(stored).toEqual({
        city: "Lyon",
        state: "Auvergne-Rhône-Alpes",
        country: "France",
        country_code: "FR",
        found: true,
        lat: 45.764,
        lon: 4.8357,
        source: "manual",
      });
    });

    it("should read missing text fields as empty", () => {
      expect(PlaceRecordUtil.parseStored({ lat: 1, lon: 2 })).toEqual({
        city: null,
        state: "",
        country: "",
        country_code: "",
        found: false,
        lat: 1,
        lon: 2,
      });
    });

    it("should reject values without a coordinate", () => {
      expect(PlaceRecordUtil.parseStored(null)).toBeNull();
      expect(PlaceRecordUtil.parseStored([1, 2])).toBeNull();
      expect(PlaceRecordUtil.parseStored({ lat: "x", lon: 2 })).toBeNull();
    });

    it("should keep the anonymized flag only when it is a boolean", () => {
      expect(
        PlaceRecordUtil.parseStored({ lat: 1, lon: 2, anonymized: true })?.anonymized
      ).toBe(true);
      expect(
        PlaceRecordUtil.parseStored({ lat: 1, lon: 2, anonymized: "yes" })
      ).not.toHaveProperty("anonymized");
    });
  });

  it("should convert between the stored and in-memory shapes", () => {
    const record = place({ anonymized: true });
    const stored = PlaceRecordUtil.toStored(record);

    expect(stored.country_code).toBe("FR");
    expect(PlaceRecordUtil.fromStored(stored)).toEqual(record);
  });

  it("should carry the previous entry's unknown fields over", () => {
    const previous = {
      ...PlaceRecordUtil.toStored(place()),
      source: "manual",
    };
    const stored = PlaceRecordUtil.toStored(
      place({ lat: 45.75, lon: 4.85, anonymized: true }),
      previous
    );

    expect(stored.source).toBe("manual");
    expect(stored.lat).toBe(45.75);
    expect(stored.anonymized).toBe(true);
  });

  describe("describe", () => {
    it("should include the state when there is one", () => {
      expect(PlaceRecordUtil.describe(place())).toBe(
        "Lyon, Auvergne-Rhône-Alpes, France (FR)"
      );
    });

    it("should leave the state out when empty", () => {
      expect(PlaceRecordUtil.describe(place({ state: "" }))).toBe(
        "Lyon, France (FR)"
      );
    });
  });
});
