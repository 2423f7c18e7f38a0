import type {
  AggregatedObservations,
  LayerStrategy,
} from "../observations/observations.schema";

export const MAP_RENDERER = Symbol("MAP_RENDERER");

export interface RadiusRing {
  radiusKm: number;
  label: string;
  color: string;
  weight: number;
  dashArray?: string;
  /** Longitude offset of the label from the center. */
  labelOffsetLng: number;
}

export interface MapDocument {
  title: string;
  subtitle: string;
  center: { lat: number; lng: number };
  zoom: number;
  rings: RadiusRing[];
  /** Species → color, in legend order. */
  colors: Map<string, string>;
  observations: AggregatedObservations;
  strategy: LayerStrategy;
  notice?: string;
}

export interface MapRenderer {
  render(document: MapDocument): string;
}

export function buildRadiusRings(radiusKm: number): RadiusRing[] {
  return [
    {
      radiusKm,
      label: `~${radiusKm} km`,
      color: "#08519c",
      weight: 3,
      labelOffsetLng: (0.09 * radiusKm) / 10,
    },
    {
      radiusKm: 1,
      label: "1 km",
      color: "#000000",
      weight: 2,
      dashArray: "5,5",
      labelOffsetLng: 0.009,
    },
    {
      radiusKm: 5,
      label: "5 km",
      color: "#555555",
      weight: 2,
      dashArray: "5,7",
      labelOffsetLng: 0.045,
    },
  ];
}
