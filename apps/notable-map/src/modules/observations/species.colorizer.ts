import crypto from "node:crypto";
import { Injectable } from "@nestjs/common";
import { UNKNOWN_SPECIES } from "./observations.schema";

const SATURATION = 0.7;
const LIGHTNESS = 0.45;

/** SHA-1 digest of the name, read as one big unsigned integer, modulo 360. */
function hueFor(name: string): number {
  const digest = crypto.createHash("sha1").update(name, "utf8").digest("hex");
  let hue = 0;
  for (const char of digest) {
    hue = (hue * 16 + parseInt(char, 16)) % 360;
  }
  return hue;
}

function toHexByte(value: number): string {
  return Math.trunc(value * 255)
    .toString(16)
    .padStart(2, "0");
}

export function hslToHex(
  hue: number,
  saturation: number,
  lightness: number
): string {
  const chroma = (1 - Math.abs(2 * lightness - 1)) * saturation;
  const x = chroma * (1 - Math.abs(((hue / 60) % 2) - 1));
  const m = lightness - chroma / 2;

  let rgb: [number, number, number];
  if (hue < 60) rgb = [chroma, x, 0];
  else if (hue < 120) rgb = [x, chroma, 0];
  else if (hue < 180) rgb = [0, chroma, x];
  else if (hue < 240) rgb = [0, x, chroma];
  else if (hue < 300) rgb = [x, 0, chroma];
  else rgb = [chroma, 0, x];

  return `#${rgb.map((channel) => toHexByte(channel + m)).join("")}`;
}

@Injectable()
export class SpeciesColorizer {
  /** Same name, same color, in any process. */
  colorFor(speciesName?: string | null): string {
    return hslToHex(
      hueFor(speciesName || UNKNOWN_SPECIES),
      SATURATION,
      LIGHTNESS
    );
  }

  /**
   * Species → color in legend order (sorted by name). Sorting only affects
   * iteration order, never the colors.
   */
  buildColorTable(speciesNames: Iterable<string>): Map<string, string> {
    const sorted = [...new Set(speciesNames)].sort();
    return new Map(sorted.map((name) => [name, this.colorFor(name)]));
  }
}
