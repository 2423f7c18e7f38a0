import { Injectable } from "@nestjs/common";
import type { SightingDetail } from "../observations/observations.schema";
import { escapeHtml, toScriptJson } from "./html";
import type { MapDocument, MapRenderer } from "./map.renderer";

const LEAFLET_CDN = "https://unpkg.com/leaflet@1.9.4/dist";
const MARKERCLUSTER_CDN = "https://unpkg.com/leaflet.markercluster@1.5.3/dist";

/** Control plugins loaded after Leaflet itself, in this order. */
export const CONTROL_PLUGINS = [
  {
    css: "https://unpkg.com/leaflet.fullscreen@3.0.0/Control.FullScreen.css",
    js: "https://unpkg.com/leaflet.fullscreen@3.0.0/Control.FullScreen.js",
  },
  {
    css: "https://unpkg.com/leaflet-minimap@3.6.1/dist/Control.MiniMap.min.css",
    js: "https://unpkg.com/leaflet-minimap@3.6.1/dist/Control.MiniMap.min.js",
  },
  {
    css: "https://unpkg.com/leaflet-measure@3.1.0/dist/leaflet-measure.css",
    js: "https://unpkg.com/leaflet-measure@3.1.0/dist/leaflet-measure.js",
  },
  {
    css: "https://unpkg.com/leaflet.locatecontrol@0.79.0/dist/L.Control.Locate.min.css",
    js: "https://unpkg.com/leaflet.locatecontrol@0.79.0/dist/L.Control.Locate.min.js",
  },
  {
    css: "https://unpkg.com/leaflet-mouse-position@1.2.0/src/L.Control.MousePosition.css",
    js: "https://unpkg.com/leaflet-mouse-position@1.2.0/src/L.Control.MousePosition.js",
  },
] as const;

const TILE_URL = "https://tile.openstreetmap.org/{z}/{x}/{y}.png";
export const COMBINED_LAYER = "Notable sightings";
const FALLBACK_COLOR = "#444444";

interface RingPayload {
  radiusM: number;
  color: string;
  weight: number;
  dashArray: string | null;
  labelLat: number;
  labelLng: number;
  labelHtml: string;
}

interface MarkerPayload {
  lat: number;
  lng: number;
  layer: string;
  tooltip: string;
  iconHtml: string;
  popupHtml: string;
}

/** Everything the browser script needs; strings are already HTML-safe. */
export interface MapPayload {
  center: [number, number];
  zoom: number;
  rings: RingPayload[];
  layers: string[];
  markers: MarkerPayload[];
}

function sightingLine(species: string, detail: SightingDetail): string {
  const count = detail.count ?? "Unknown";
  const when = escapeHtml(detail.observedAt ?? "Unknown");
  let line = `<b>${escapeHtml(species)}</b> (${count}) on ${when}`;
  if (detail.checklistUrl) {
    line += ` [<a href="${escapeHtml(detail.checklistUrl)}" target="_blank" rel="noopener">Checklist</a>]`;
  }
  return line;
}

export function popupHtml(species: string, details: SightingDetail[]): string {
  const locationName = escapeHtml(details[0]?.locationName ?? "");
  const lines = details.map((detail) => sightingLine(species, detail));
  return (
    `<div style="font-size:13px;">` +
    `<div><b>Location:</b> ${locationName}</div>` +
    `<hr style="margin:6px 0;">` +
    `<div>${lines.join("<br>")}</div>` +
    `</div>`
  );
}

function dotIcon(color: string): string {
  return `<div style="width:14px;height:14px;border-radius:50%;background:${color};border:1.5px solid #222;"></div>`;
}

/**
 * Renders a standalone Leaflet page. Per-species maps get one clustered,
 * toggleable overlay per species; combined maps put every marker in a
 * single cluster.
 */
@Injectable()
export class LeafletHtmlRenderer implements MapRenderer {
  buildPayload(document: MapDocument): MapPayload {
    const { center, observations, colors, strategy } = document;
    const perSpecies = strategy === "per-species";

    const markers: MarkerPayload[] = [];
    for (const location of observations.locations.values()) {
      for (const [species, details] of location.species) {
        const name = escapeHtml(species);
        markers.push({
          lat: location.lat,
          lng: location.lng,
          layer: perSpecies ? name : COMBINED_LAYER,
          tooltip: name,
          iconHtml: dotIcon(colors.get(species) ?? FALLBACK_COLOR),
          popupHtml: popupHtml(species, details),
        });
      }
    }

    return {
      center: [center.lat, center.lng],
      zoom: document.zoom,
      rings: document.rings.map((ring) => ({
        radiusM: ring.radiusKm * 1000,
        color: ring.color,
        weight: ring.weight,
        dashArray: ring.dashArray ?? null,
        labelLat: center.lat,
        labelLng: center.lng + ring.labelOffsetLng,
        labelHtml: `<div style="font-size:11px;color:${ring.color};white-space:nowrap;">${escapeHtml(ring.label)}</div>`,
      })),
      layers: perSpecies
        ? [...colors.keys()].map((species) => escapeHtml(species))
        : [COMBINED_LAYER],
      markers,
    };
  }

  renderLegend(colors: Map<string, string>): string {
    const items = [...colors].map(
      ([species, color]) =>
        `<div class="legend-item"><span class="legend-swatch" style="background:${color};"></span><span class="legend-name">${escapeHtml(species)}</span></div>`
    );
    return (
      `<div id="legend" class="panel"><div class="legend-title">Species Legend</div>` +
      (items.length > 0
        ? items.join("")
        : `<div class="legend-empty">No species</div>`) +
      `</div>`
    );
  }

  render(document: MapDocument): string {
    const payload = this.buildPayload(document);
    const notice = document.notice
      ? `<div class="panel notice">${escapeHtml(document.notice)}</div>`
      : "";

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(document.title)}</title>
<link rel="stylesheet" href="${LEAFLET_CDN}/leaflet.css">
<link rel="stylesheet" href="${MARKERCLUSTER_CDN}/MarkerCluster.css">
<link rel="stylesheet" href="${MARKERCLUSTER_CDN}/MarkerCluster.Default.css">
${CONTROL_PLUGINS.map((plugin) => `<link rel="stylesheet" href="${plugin.css}">`).join("\n")}
<style>
html, body, #map { height: 100%; margin: 0; }
.panel { position: fixed; z-index: 1000; background: rgba(255,255,255,0.95); border: 1px solid #999; border-radius: 6px; font-family: sans-serif; }
.title-bar { top: 10px; left: 50%; transform: translateX(-50%); padding: 6px 10px; font-size: 14px; font-weight: 600; text-align: center; }
.title-bar .subtitle { font-size: 12px; font-weight: 400; }
.notice { top: 50%; left: 50%; transform: translate(-50%, -50%); padding: 10px 14px; font-size: 14px; z-index: 1500; }
#legend { bottom: 16px; right: 16px; padding: 8px 10px; max-height: 70vh; max-width: 28vw; overflow-y: auto; resize: vertical; font-size: 12px; }
.legend-title { font-weight: 600; margin-bottom: 6px; }
.legend-item { display: flex; align-items: center; margin: 2px 0; }
.legend-swatch { width: 12px; height: 12px; margin-right: 6px; border: 1px solid #333; flex: 0 0 12px; }
</style>
</head>
<body>
<div id="map"></div>
<div class="panel title-bar"><div>${escapeHtml(document.title)}</div><div class="subtitle">${escapeHtml(document.subtitle)}</div></div>
${notice}
${this.renderLegend(document.colors)}
<script src="${LEAFLET_CDN}/leaflet.js"></script>
<script src="${MARKERCLUSTER_CDN}/leaflet.markercluster.js"></script>
${CONTROL_PLUGINS.map((plugin) => `<script src="${plugin.js}"></script>`).join("\n")}
<script>
const data = ${toScriptJson(payload)};
const map = L.map("map").setView(data.center, data.zoom);
L.tileLayer("${TILE_URL}", {
  maxZoom: 19,
  attribution: "&copy; OpenStreetMap contributors",
}).addTo(map);
L.control.scale().addTo(map);
L.control.fullscreen().addTo(map);
new L.Control.MiniMap(L.tileLayer("${TILE_URL}"), { toggleDisplay: true, position: "bottomleft" }).addTo(map);
new L.Control.Measure({ primaryLengthUnit: "kilometers" }).addTo(map);
L.control.locate({ keepCurrentZoomLevel: false }).addTo(map);
L.control.mousePosition({ separator: " , ", prefix: "Lat, Lon:" }).addTo(map);
L.circleMarker(data.center, { radius: 4, color: "#2c7fb8", fill: true, fillOpacity: 1 })
  .bindTooltip("Center")
  .addTo(map);
for (const ring of data.rings) {
  L.circle(data.center, { radius: ring.radiusM, color: ring.color, fill: false, weight: ring.weight, opacity: 0.9, dashArray: ring.dashArray })
    .addTo(map);
  L.marker([ring.labelLat, ring.labelLng], { icon: L.divIcon({ className: "", html: ring.labelHtml }) })
    .addTo(map);
}
const overlays = {};
for (const name of data.layers) {
  overlays[name] = L.markerClusterGroup().addTo(map);
}
for (const m of data.markers) {
  const icon = L.divIcon({ className: "", html: m.iconHtml, iconSize: [14, 14], iconAnchor: [7, 7] });
  L.marker([m.lat, m.lng], { icon })
    .bindTooltip(m.tooltip)
    .bindPopup(m.popupHtml, { maxWidth: 320 })
    .addTo(overlays[m.layer]);
}
L.control.layers(null, overlays, { collapsed: false }).addTo(map);
</script>
</body>
</html>
`;
  }
}
