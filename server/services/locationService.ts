/**
 * Location Service - geocoding and POI search routed by region.
 *
 * Domestic places go to AMap (with Mapbox as geocoding fallback), foreign
 * places to Mapbox. Every call is time-boxed and returns null / [] on
 * failure; callers decide what "no result" means.
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { AppConfig } from "../config";
import { TtlCache } from "../utils/ttlCache";
import type { GeocodeResult, LocationClient, PlaceRecommendation } from "./itinerary";

// ============================================================================
// REGION ROUTING
// ============================================================================

const keywordFileSchema = z.object({
  foreign: z.array(z.string()),
});

export type LocationKeywords = z.infer<typeof keywordFileSchema>;

function loadKeywords(): LocationKeywords {
  const raw = readFileSync(new URL("../data/locationKeywords.json", import.meta.url), "utf-8");
  const parsed = keywordFileSchema.parse(JSON.parse(raw));
  return { foreign: parsed.foreign.map((k) => k.toLowerCase()) };
}

let keywords: LocationKeywords | null = null;

/**
 * A place is foreign only when it names a known foreign city; anything
 * unrecognized is treated as domestic.
 */
export function isDomesticLocation(location: string | null | undefined, list?: LocationKeywords): boolean {
  if (!location || !location.trim()) return true;

  const { foreign } = list ?? (keywords ??= loadKeywords());
  const needle = location.toLowerCase();
  return !foreign.some((k) => needle.includes(k.toLowerCase()));
}

// ============================================================================
// HTTP
// ============================================================================

async function fetchJson(url: string, timeoutMs: number, tag: string): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      console.error(`[${tag}] Request failed: ${response.status} ${response.statusText}`);
      return null;
    }
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      console.error(`[${tag}] Request timed out after ${timeoutMs}ms`);
    } else {
      console.error(`[${tag}] Request error:`, error instanceof Error ? error.message : error);
    }
    return null;
  } finally {
    clearTimeout(timeout);
  }
}

// AMap returns [] in place of empty strings
const looseText = z.unknown().transform((value) => (typeof value === "string" && value.trim() ? value : null));

function parseLngLat(value: string | null): { lat: number; lng: number } | null {
  if (!value) return null;
  const [lng, lat] = value.split(",").map((part) => Number.parseFloat(part));
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) return null;
  return { lat, lng };
}

// ============================================================================
// AMAP
// ============================================================================

const AMAP_BASE_URL = "https://restapi.amap.com/v3";

export const AMAP_TYPE_ATTRACTIONS = "110000";
export const AMAP_TYPE_RESTAURANTS = "050000";

const amapGeocodeSchema = z.object({
  status: z.string(),
  info: z.string().optional(),
  geocodes: z
    .array(z.object({ location: looseText, formatted_address: looseText }))
    .optional()
    .default([]),
});

const amapPlaceSchema = z.object({
  status: z.string(),
  info: z.string().optional(),
  pois: z
    .array(
      z.object({
        name: z.string(),
        address: looseText,
        location: looseText,
        type: looseText,
        tel: looseText,
      })
    )
    .optional()
    .default([]),
});

export interface AmapClientOptions {
  apiKey: string;
  securityKey?: string;
  timeoutMs: number;
}

export class AmapClient {
  constructor(private readonly options: AmapClientOptions) {}

  /** `sig` = md5 of the sorted query string followed by the security key. */
  sign(params: Record<string, string>): string {
    const query = Object.keys(params)
      .filter((key) => key !== "sig")
      .sort()
      .map((key) => `${key}=${params[key]}`)
      .join("&");
    return createHash("md5").update(query + (this.options.securityKey ?? ""), "utf8").digest("hex");
  }

  private buildUrl(path: string, params: Record<string, string>): string {
    const all: Record<string, string> = { ...params, key: this.options.apiKey, output: "json" };
    if (this.options.securityKey) {
      all.sig = this.sign(all);
    }
    return `${AMAP_BASE_URL}${path}?${new URLSearchParams(all).toString()}`;
  }

  async geocode(address: string): Promise<GeocodeResult | null> {
    const body = await fetchJson(this.buildUrl("/geocode/geo", { address }), this.options.timeoutMs, "Amap");
    if (body === null) return null;

    const parsed = amapGeocodeSchema.safeParse(body);
    if (!parsed.success) {
      console.warn(`[Amap] Unexpected geocode response for "${address}"`);
      return null;
    }
    if (parsed.data.status !== "1") {
      console.warn(`[Amap] Geocode error for "${address}": ${parsed.data.info ?? "unknown"}`);
      return null;
    }

    const first = parsed.data.geocodes[0];
    const coords = parseLngLat(first?.location ?? null);
    if (!first || !coords) return null;

    return { ...coords, formattedAddress: first.formatted_address };
  }

  async searchPlaces(keywords: string, city: string, types: string): Promise<PlaceRecommendation[]> {
    const url = this.buildUrl("/place/text", { keywords, city, types, page: "1", offset: "20" });
    const body = await fetchJson(url, this.options.timeoutMs, "Amap");
    if (body === null) return [];

    const parsed = amapPlaceSchema.safeParse(body);
    if (!parsed.success || parsed.data.status !== "1") {
      console.warn(`[Amap] Place search returned nothing usable (keywords=${keywords}, city=${city})`);
      return [];
    }

    return parsed.data.pois.map((poi) => {
      const coords = parseLngLat(poi.location);
      return {
        name: poi.name,
        address: poi.address,
        lat: coords?.lat ?? null,
        lng: coords?.lng ?? null,
        type: poi.type,
        tel: poi.tel,
      };
    });
  }

  searchAttractions(city: string): Promise<PlaceRecommendation[]> {
    return this.searchPlaces("景点", city, AMAP_TYPE_ATTRACTIONS);
  }

  searchRestaurants(city: string): Promise<PlaceRecommendation[]> {
    return this.searchPlaces("餐厅", city, AMAP_TYPE_RESTAURANTS);
  }
}

// ============================================================================
// MAPBOX
// ============================================================================

const MAPBOX_GEOCODE_URL = "https://api.mapbox.com/search/geocode/v6/forward";
const MAPBOX_CATEGORY_URL = "https://api.mapbox.com/search/searchbox/v1/category";

const mapboxFeatureSchema = z.object({
  geometry: z.object({ coordinates: z.tuple([z.number(), z.number()]).rest(z.number()) }),
  properties: z
    .object({
      name: z.string().optional(),
      full_address: z.string().optional(),
      address: z.string().optional(),
      poi_category: z.array(z.string()).optional(),
    })
    .passthrough()
    .optional()
    .default({}),
});

const mapboxCollectionSchema = z.object({
  features: z.array(z.unknown()).default([]),
});

function decodeFeatures(body: unknown): Array<z.infer<typeof mapboxFeatureSchema>> {
  const collection = mapboxCollectionSchema.safeParse(body);
  if (!collection.success) return [];

  const features: Array<z.infer<typeof mapboxFeatureSchema>> = [];
  for (const candidate of collection.data.features) {
    const feature = mapboxFeatureSchema.safeParse(candidate);
    if (feature.success) features.push(feature.data);
  }
  return features;
}

export interface MapboxClientOptions {
  accessToken: string;
  timeoutMs: number;
}

export class MapboxClient {
  constructor(private readonly options: MapboxClientOptions) {}

  async geocode(query: string, country?: string): Promise<GeocodeResult | null> {
    const params = new URLSearchParams({ q: query, access_token: this.options.accessToken, limit: "1" });
    if (country) params.set("country", country);

    const body = await fetchJson(`${MAPBOX_GEOCODE_URL}?${params.toString()}`, this.options.timeoutMs, "Mapbox");
    const [first] = decodeFeatures(body);
    if (!first) return null;

    const [lng, lat] = first.geometry.coordinates;
    return { lat, lng, formattedAddress: first.properties.full_address ?? first.properties.name ?? null };
  }

  /** POIs of a Search Box category around the geocoded city center. */
  async searchCategory(city: string, category: string): Promise<PlaceRecommendation[]> {
    const center = await this.geocode(city);
    if (!center) return [];

    const params = new URLSearchParams({
      access_token: this.options.accessToken,
      proximity: `${center.lng},${center.lat}`,
      limit: "20",
    });
    const url = `${MAPBOX_CATEGORY_URL}/${encodeURIComponent(category)}?${params.toString()}`;
    const features = decodeFeatures(await fetchJson(url, this.options.timeoutMs, "Mapbox"));

    return features
      .filter((feature) => Boolean(feature.properties.name))
      .map((feature) => {
        const [lng, lat] = feature.geometry.coordinates;
        return {
          name: feature.properties.name ?? "",
          address: feature.properties.full_address ?? feature.properties.address ?? null,
          lat,
          lng,
          type: feature.properties.poi_category?.join(";") ?? category,
          tel: null,
        };
      });
  }
}

// ============================================================================
// ROUTED CLIENT
// ============================================================================

export interface RoutedLocationClientOptions {
  amap: AmapClient | null;
  mapbox: MapboxClient | null;
  cacheTtlMs: number;
  cacheMaxSize?: number;
  now?: () => number;
}

export class RoutedLocationClient implements LocationClient {
  private readonly amap: AmapClient | null;
  private readonly mapbox: MapboxClient | null;
  private readonly geocodeCache: TtlCache<string, GeocodeResult | null>;
  private readonly searchCache: TtlCache<string, PlaceRecommendation[]>;

  constructor(options: RoutedLocationClientOptions) {
    this.amap = options.amap;
    this.mapbox = options.mapbox;
    const cacheOptions = { maxSize: options.cacheMaxSize ?? 1000, ttlMs: options.cacheTtlMs, now: options.now };
    this.geocodeCache = new TtlCache<string, GeocodeResult | null>(cacheOptions);
    this.searchCache = new TtlCache<string, PlaceRecommendation[]>(cacheOptions);
  }

  geocode(address: string, hintCity?: string): Promise<GeocodeResult | null> {
    const domestic = isDomesticLocation(hintCity || address);
    const key = `${domestic ? "cn" : "intl"}:${address}`;

    return this.geocodeCache.getOrLoad(key, async () => {
      if (domestic) {
        const result = this.amap ? await this.amap.geocode(address) : null;
        if (result) return result;
        if (this.mapbox) {
          console.log(`[Location] AMap had no result for "${address}", trying Mapbox`);
          return this.mapbox.geocode(address, "cn");
        }
        return null;
      }
      return this.mapbox ? this.mapbox.geocode(address) : null;
    });
  }

  searchAttractions(city: string): Promise<PlaceRecommendation[]> {
    return this.search(city, "attractions", (amap) => amap.searchAttractions(city), "tourist_attraction");
  }

  searchRestaurants(city: string): Promise<PlaceRecommendation[]> {
    return this.search(city, "restaurants", (amap) => amap.searchRestaurants(city), "restaurant");
  }

  private search(
    city: string,
    kind: string,
    viaAmap: (amap: AmapClient) => Promise<PlaceRecommendation[]>,
    mapboxCategory: string
  ): Promise<PlaceRecommendation[]> {
    const domestic = isDomesticLocation(city);
    const key = `${kind}:${domestic ? "cn" : "intl"}:${city}`;

    return this.searchCache.getOrLoad(
      key,
      async () => {
        if (domestic) {
          return this.amap ? viaAmap(this.amap) : [];
        }
        return this.mapbox ? this.mapbox.searchCategory(city, mapboxCategory) : [];
      },
      (places) => places.length > 0
    );
  }
}

export type LocationConfig = Pick<
  AppConfig,
  "AMAP_API_KEY" | "AMAP_SECURITY_KEY" | "MAPBOX_ACCESS_TOKEN" | "LOCATION_CACHE_TTL_MINUTES" | "LOCATION_TIMEOUT_MS"
>;

export function createLocationClient(config: LocationConfig): RoutedLocationClient {
  const timeoutMs = config.LOCATION_TIMEOUT_MS;

  if (!config.AMAP_API_KEY) console.warn("[Location] AMAP_API_KEY not set; domestic lookups fall back to Mapbox");
  if (!config.MAPBOX_ACCESS_TOKEN) console.warn("[Location] MAPBOX_ACCESS_TOKEN not set; foreign lookups disabled");

  return new RoutedLocationClient({
    amap: config.AMAP_API_KEY
      ? new AmapClient({ apiKey: config.AMAP_API_KEY, securityKey: config.AMAP_SECURITY_KEY, timeoutMs })
      : null,
    mapbox: config.MAPBOX_ACCESS_TOKEN
      ? new MapboxClient({ accessToken: config.MAPBOX_ACCESS_TOKEN, timeoutMs })
      : null,
    cacheTtlMs: config.LOCATION_CACHE_TTL_MINUTES * 60_000,
  });
}
