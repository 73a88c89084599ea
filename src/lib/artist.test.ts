import { describe, expect, it } from "vitest";
import { artistVariants, normalizeArtistName } from "./artist";

describe("normalizeArtistName", () => {
  it("strips featured and collaborating artists", () => {
    expect(normalizeArtistName("Daft Punk feat. Pharrell Williams")).toBe("Daft Punk");
    expect(normalizeArtistName("KAYTRANADA, H.E.R.")).toBe("KAYTRANADA");
    expect(normalizeArtistName("Silk Sonic (Bruno Mars & Anderson .Paak)")).toBe("Silk Sonic");
  });

  it("keeps band names that only look like collaborations", () => {
    expect(normalizeArtistName("Tyler, The Creator")).toBe("Tyler, The Creator");
    expect(normalizeArtistName("Iron & Wine")).toBe("Iron & Wine");
  });
});

describe("artistVariants", () => {
  it("adds the name without a leading article", () => {
    expect(artistVariants("The Cure")).toEqual(["The Cure", "Cure"]);
  });

  it("adds the primary artist", () => {
    expect(artistVariants("Daft Punk feat. Pharrell")).toEqual([
      "Daft Punk feat. Pharrell",
      "Daft Punk",
    ]);
  });

  it("returns nothing for a blank name", () => {
    expect(artistVariants("   ")).toEqual([]);
  });
});
