import { z } from "zod";
import { CONFIG, type Agent, type Precheck, type Provider, type Renderer, type StatusClass } from "../config";
import { ProviderError, describeError } from "../errors";
import { formatTimestamp, tooltipWithFooter } from "../format";
import { GLYPHS, withIcon } from "../glyphs";
import { networkPrecheck } from "../reachability";
import { failureRecord } from "../render";
import { failure, isSuccess, success } from "../result";

const featureSchema = z.object({
  id: z.string(),
  properties: z.object({
    mag: z.number().nullable(),
    place: z.string().nullable(),
    time: z.number(),
  }),
});

const feedSchema = z.object({
  features: z.array(featureSchema),
});

export interface Quake {
  id: string;
  magnitude: number | null;
  place: string;
  time: Date;
}

export interface QuakeReport {
  location: string;
  quakes: Quake[];
}

export interface QuakeOptions {
  radiusKm?: number;
  limit?: number;
  minMagnitude?: number;
}

export type JsonFetcher = (url: URL, signal: AbortSignal) => Promise<unknown>;

export const fetchJson: JsonFetcher = async (url, signal) => {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new ProviderError(`USGS returned HTTP ${response.status}`);
  }
  return response.json();
};

/**
 * Parses a "lat,lon" target.
 */
export function parseLocation(target: string): { latitude: number; longitude: number } | null {
  const match = target.match(/^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/);
  if (!match) return null;

  const latitude = parseFloat(match[1]);
  const longitude = parseFloat(match[2]);
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;
  return { latitude, longitude };
}

export function buildQueryUrl(
  coordinates: { latitude: number; longitude: number },
  options: QuakeOptions,
  now: Date
): URL {
  const url = new URL(CONFIG.QUAKES_URL);
  const since = new Date(now.getTime() - 24 * 60 * 60 * 1000);
  const params: Record<string, string> = {
    format: "geojson",
    starttime: since.toISOString(),
    endtime: now.toISOString(),
    latitude: String(coordinates.latitude),
    longitude: String(coordinates.longitude),
    maxradiuskm: String(options.radiusKm ?? CONFIG.QUAKES_DEFAULT_RADIUS_KM),
    limit: String(options.limit ?? CONFIG.QUAKES_DEFAULT_LIMIT),
    minmagnitude: String(options.minMagnitude ?? CONFIG.QUAKES_DEFAULT_MIN_MAGNITUDE),
    orderby: "time",
  };
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url;
}

export function parseFeed(body: unknown): Quake[] {
  const parsed = feedSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderError("unexpected response from USGS");
  }
  return parsed.data.features.map((feature) => ({
    id: feature.id,
    magnitude: feature.properties.mag,
    place: feature.properties.place ?? "unknown location",
    time: new Date(feature.properties.time),
  }));
}

export function createQuakesProvider(options: QuakeOptions = {}, getJson: JsonFetcher = fetchJson): Provider<QuakeReport> {
  return {
    async fetch(targets, signal) {
      return Promise.all(
        targets.map(async (location) => {
          const coordinates = parseLocation(location);
          if (!coordinates) return failure<QuakeReport>(`invalid location "${location}"`);

          try {
            const body = await getJson(buildQueryUrl(coordinates, options, new Date()), signal);
            return success<QuakeReport>({ location, quakes: parseFeed(body) });
          } catch (error) {
            return failure<QuakeReport>(describeError(error));
          }
        })
      );
    },
  };
}

export function quakeClass(magnitude: number | null): StatusClass {
  if (magnitude === null) return "success";
  if (magnitude >= 5) return "critical";
  if (magnitude >= 3) return "warning";
  return "success";
}

function describeMagnitude(magnitude: number | null): string {
  return magnitude === null ? "mag ?" : `mag ${magnitude.toFixed(1)}`;
}

export const quakesRenderer: Renderer<QuakeReport> = {
  render(result) {
    if (!isSuccess(result)) return failureRecord(result.error);

    const { location, quakes } = result.payload;
    const latest = quakes[0];
    if (!latest) {
      return {
        text: withIcon(GLYPHS.earth, `no quakes near ${location}`),
        class: "success",
        tooltip: tooltipWithFooter([`No earthquakes in the last 24 hours near ${location}`], result.updatedAt),
      };
    }

    const headers = quakes.map((quake) => `${formatTimestamp(quake.time)} - ${describeMagnitude(quake.magnitude)}`);
    const width = Math.max(...headers.map((header) => header.length));
    const lines = quakes.map((quake, index) => `${headers[index].padEnd(width)} ${quake.place}`);
    const strongest = Math.max(...quakes.map((quake) => quake.magnitude ?? 0));

    return {
      text: withIcon(GLYPHS.earth, `${describeMagnitude(latest.magnitude)} ${latest.place}`),
      class: quakeClass(strongest),
      tooltip: tooltipWithFooter(lines, result.updatedAt),
    };
  },
};

export function createQuakesAgent(
  options: QuakeOptions & { getJson?: JsonFetcher; precheck?: Precheck } = {}
): Agent<QuakeReport> {
  return {
    name: "quakes",
    label: "earthquake data",
    provider: createQuakesProvider(options, options.getJson),
    renderer: quakesRenderer,
    precheck: options.precheck ?? networkPrecheck(),
  };
}
