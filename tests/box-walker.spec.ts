import { findChild, iterateBoxes, nextBox } from "../src/mp4/box-walker";
import { box, concat, largeBox, pad, str, u32 } from "./helpers/iso-builder";

describe("box-walker", () => {
  describe("nextBox", () => {
    it("should read a box with a 32-bit size", () => {
      const data = box("free", Uint8Array.from([1, 2, 3, 4]));

      const result = nextBox(data, 0);

      expect(result?.type).toBe("free");
      expect(result?.content).toEqual(Uint8Array.from([1, 2, 3, 4]));
      expect(result?.end).toBe(12);
    });

    it("should read a box with a 64-bit size", () => {
      const data = largeBox("mdat", Uint8Array.from([9, 8, 7, 6, 5]));

      const result = nextBox(data, 0);

      expect(result?.type).toBe("mdat");
      expect(result?.content).toEqual(Uint8Array.from([9, 8, 7, 6, 5]));
      expect(result?.end).toBe(21);
    });

    it("should extend a size-0 box to the end of the buffer", () => {
      const data = concat(box("free"), u32(0), str("mdat"), pad(10));

      const result = nextBox(data, 8);

      expect(result?.content.length).toBe(10);
      expect(result?.end).toBe(data.length);
    });

    it("should return null when the declared size exceeds the buffer", () => {
      expect(nextBox(concat(u32(100), str("mdat"), pad(4)), 0)).toBeNull();
    });

    it("should return null when the declared size is smaller than the header", () => {
      expect(nextBox(concat(u32(4), str("free")), 0)).toBeNull();
      expect(nextBox(concat(u32(1), str("mdat"), u32(0), u32(8)), 0)).toBeNull();
    });

    it("should return null for a truncated header", () => {
      expect(nextBox(Uint8Array.from([0, 0, 0]), 0)).toBeNull();
      expect(nextBox(concat(u32(1), str("mdat"), pad(4)), 0)).toBeNull();
    });

    it("should read relative to a view's own start", () => {
      const data = concat(pad(3), box("moov", pad(2))).subarray(3);

      expect(nextBox(data, 0)?.type).toBe("moov");
    });
  });

  describe("iterateBoxes", () => {
    it("should yield siblings in order and stop at the first unreadable box", () => {
      const data = concat(box("ftyp", pad(4)), box("free"), box("moov", pad(8)), pad(5));

      expect([...iterateBoxes(data)].map((b) => b.type)).toEqual(["ftyp", "free", "moov"]);
    });

    it("should yield nothing for an empty buffer", () => {
      expect([...iterateBoxes(new Uint8Array(0))]).toEqual([]);
    });
  });

  describe("findChild", () => {
    it("should return the content of the first matching box", () => {
      const data = concat(box("free"), box("moov", Uint8Array.from([7, 7])), box("moov", pad(1)));

      expect(findChild(data, "moov")).toEqual(Uint8Array.from([7, 7]));
    });

    it("should return null when no box matches", () => {
      expect(findChild(box("free"), "moov")).toBeNull();
    });
  });
});
