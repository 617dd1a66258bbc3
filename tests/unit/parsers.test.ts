import { describe, it, expect } from "vitest";
import {
  isFriendStatus,
  pairListRows,
  parseAuthor,
  parseCounterText,
  parseRowStatus,
} from "../../src/platforms/tiktok/parsers";
import { element, rowBounds } from "../fakes/fake-screen";

describe("Screen text parsers", () => {
  describe("parseCounterText", () => {
    it("should strip counter labels before parsing", () => {
      expect(parseCounterText("1.2K Followers")).toBe(1_200);
      expect(parseCounterText("345 Following")).toBe(345);
      expect(parseCounterText("12.3M Likes")).toBe(12_300_000);
    });

    it("should return null for missing text", () => {
      expect(parseCounterText(null)).toBeNull();
    });
  });

  describe("parseAuthor", () => {
    it("should keep only the handle", () => {
      expect(parseAuthor("@Alice · 3d ago")).toBe("alice");
      expect(parseAuthor("@bob.the_builder")).toBe("bob.the_builder");
    });

    it("should return an empty string when no author is shown", () => {
      expect(parseAuthor(null)).toBe("");
    });
  });

  describe("row status", () => {
    it("should map button labels case-insensitively", () => {
      expect(parseRowStatus("follow back")).toBe("Follow back");
      expect(parseRowStatus(" Friends ")).toBe("Friends");
      expect(parseRowStatus("Message")).toBeNull();
      expect(parseRowStatus(null)).toBeNull();
    });

    it("should treat Friends and Following as existing relationships", () => {
      expect(isFriendStatus("Friends")).toBe(true);
      expect(isFriendStatus("Following")).toBe(true);
      expect(isFriendStatus("Follow back")).toBe(false);
      expect(isFriendStatus(null)).toBe(false);
    });
  });

  describe("pairListRows", () => {
    it("should pair usernames with the button and name in the same band, top to bottom", () => {
      const rows = pairListRows(
        [element("@second", rowBounds(300)), element("first", rowBounds(100))],
        [element("Following", rowBounds(110, 800, 1000)), element("Follow", rowBounds(310, 800, 1000))],
        [element(" First Person ", rowBounds(120))]
      );

      expect(rows).toEqual([
        {
          username: "first",
          displayName: "First Person",
          status: "Following",
          bounds: rowBounds(100),
          buttonBounds: rowBounds(110, 800, 1000),
        },
        {
          username: "second",
          displayName: "",
          status: "Follow",
          bounds: rowBounds(300),
          buttonBounds: rowBounds(310, 800, 1000),
        },
      ]);
    });

    it("should leave the button empty when nothing overlaps the row", () => {
      const [row] = pairListRows([element("lonely", rowBounds(0))], [element("Follow", rowBounds(500))]);
      expect(row?.status).toBeNull();
      expect(row?.buttonBounds).toBeNull();
    });
  });
});
