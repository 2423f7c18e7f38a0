import type { LayerStrategy } from "./observations.schema";

/**
 * More than `threshold` species would mean too many layer toggles, so the
 * map falls back to one combined cluster.
 */
export function selectLayerStrategy(
  speciesCount: number,
  threshold: number
): LayerStrategy {
  return speciesCount > threshold ? "combined" : "per-species";
}
