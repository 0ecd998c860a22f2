import { describe, expect, it } from "vitest";
import { normalization } from "./normalization";

describe("normalization", () => {
  describe("sanitize", () => {
    it("should replace characters that are invalid in file names", () => {
      expect(normalization.sanitize('a<b>c:d"e/f\\g|h?i*j')).toBe("a_b_c_d_e_f_g_h_i_j");
    });

    it("should replace whitespace and collapse underscores", () => {
      expect(normalization.sanitize("  Q3:  Plan / Review  ")).toBe("Q3_Plan_Review");
    });

    it("should remove control characters", () => {
      expect(normalization.sanitize("Tab\u0007le\u0085s")).toBe("Tables");
    });

    it("should fall back to untitled", () => {
      expect(normalization.sanitize("")).toBe("untitled");
      expect(normalization.sanitize(" /// ")).toBe("untitled");
    });

    it("should truncate and strip a trailing underscore", () => {
      expect(normalization.sanitize("abcd efgh", 5)).toBe("abcd");
      expect(normalization.sanitize("x".repeat(150))).toHaveLength(100);
    });

    it("should not split a surrogate pair when truncating", () => {
      expect(normalization.sanitize("ab😀cd", 3)).toBe("ab😀");
    });

    it("should keep a long multi-byte name within the byte limit", () => {
      const name = normalization.sanitize("計画".repeat(60));

      expect(name).toBe("計画".repeat(33));
      expect(Buffer.byteLength(name, "utf8")).toBe(198);
    });

    it("should suffix reserved device names", () => {
      expect(normalization.sanitize("con")).toBe("con_");
      expect(normalization.sanitize("LPT1")).toBe("LPT1_");
      expect(normalization.sanitize("Console")).toBe("Console");
    });

    it("should keep unicode letters", () => {
      expect(normalization.sanitize("Café Notes")).toBe("Café_Notes");
    });
  });

  describe("FilenameRegistry", () => {
    it("should give distinct names to titles that sanitize alike", () => {
      const registry = new normalization.FilenameRegistry();

      expect(registry.claim("canvas-2", "A/B")).toBe("A_B");
      expect(registry.claim("canvas-3", "A:B")).toBe("A_B_canvas-3");
    });

    it("should compare names case-insensitively", () => {
      const registry = new normalization.FilenameRegistry();

      expect(registry.claim("p1", "Notes")).toBe("Notes");
      expect(registry.claim("p2", "notes")).toBe("notes_p2");
    });

    it("should count up when the id-suffixed name is taken too", () => {
      const registry = new normalization.FilenameRegistry();

      expect(registry.claim("p", "Doc_z")).toBe("Doc_z");
      expect(registry.claim("q", "Doc")).toBe("Doc");
      expect(registry.claim("z", "Doc")).toBe("Doc_z_2");
      expect(registry.claim("w", "Doc")).toBe("Doc_w");
    });

    it("should return the same name for a repeated claim", () => {
      const registry = new normalization.FilenameRegistry();

      registry.claim("p1", "Same");
      expect(registry.claim("p1", "Renamed")).toBe("Same");
      expect(registry.names().get("p1")).toBe("Same");
    });

    it("should shorten the stem of a long name to fit its id suffix", () => {
      const registry = new normalization.FilenameRegistry();

      expect(registry.claim("canvas-1", "計画".repeat(60))).toBe("計画".repeat(33));
      const suffixed = registry.claim("canvas-2", "計画".repeat(60));

      expect(suffixed).toBe(`${"計画".repeat(31)}計_canvas-2`);
      expect(Buffer.byteLength(suffixed, "utf8")).toBeLessThanOrEqual(normalization.MAX_NAME_BYTES);
    });

    it("should resolve a name colliding with an earlier suffixed name", () => {
      const registry = new normalization.FilenameRegistry();

      registry.claim("a", "Page");
      registry.claim("b", "Page");
      expect(registry.claim("c", "Page_b")).toBe("Page_b_c");
    });
  });
});
