import { z } from "zod";
import { UpstreamError, errorMessage } from "../errors.js";
import { htmlToText } from "./mime.js";

export const MAPS_BASE_URL = "https://maps.googleapis.com/maps/api";

export type TravelMode = "driving" | "walking" | "bicycling" | "transit";

export interface MapsClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const textValue = z.object({ text: z.string(), value: z.number() });

const envelope = z.object({
  status: z.string(),
  error_message: z.string().optional(),
});

const geocodeResponse = envelope.extend({
  results: z
    .array(
      z.object({
        formatted_address: z.string(),
        place_id: z.string(),
        types: z.array(z.string()).default([]),
        geometry: z.object({ location: z.object({ lat: z.number(), lng: z.number() }) }),
      })
    )
    .default([]),
});

const distanceResponse = envelope.extend({
  origin_addresses: z.array(z.string()).default([]),
  destination_addresses: z.array(z.string()).default([]),
  rows: z
    .array(
      z.object({
        elements: z.array(
          z.object({
            status: z.string(),
            distance: textValue.optional(),
            duration: textValue.optional(),
          })
        ),
      })
    )
    .default([]),
});

const directionsResponse = envelope.extend({
  routes: z
    .array(
      z.object({
        summary: z.string().default(""),
        legs: z.array(
          z.object({
            start_address: z.string(),
            end_address: z.string(),
            distance: textValue,
            duration: textValue,
            steps: z
              .array(
                z.object({
                  html_instructions: z.string().default(""),
                  distance: textValue,
                  duration: textValue,
                })
              )
              .default([]),
          })
        ),
      })
    )
    .default([]),
});

export interface GeocodeResult {
  formattedAddress: string;
  placeId: string;
  location: { lat: number; lng: number };
  types: string[];
}

export interface DistanceResult {
  origin: string;
  destination: string;
  mode: TravelMode;
  distance: { text: string; meters: number };
  duration: { text: string; seconds: number };
}

export interface DirectionsResult {
  summary: string;
  startAddress: string;
  endAddress: string;
  mode: TravelMode;
  distance: { text: string; meters: number };
  duration: { text: string; seconds: number };
  steps: { instruction: string; distance: string; duration: string }[];
}

export class MapsClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MapsClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? MAPS_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async geocode(address: string): Promise<GeocodeResult[]> {
    const data = await this.get("geocode", { address }, geocodeResponse);
    return data.results.map((r) => ({
      formattedAddress: r.formatted_address,
      placeId: r.place_id,
      location: r.geometry.location,
      types: r.types,
    }));
  }

  async distance(origin: string, destination: string, mode: TravelMode): Promise<DistanceResult> {
    const data = await this.get(
      "distancematrix",
      { origins: origin, destinations: destination, mode },
      distanceResponse
    );
    const element = data.rows[0]?.elements[0];
    if (!element || element.status !== "OK" || !element.distance || !element.duration) {
      throw new UpstreamError(`No route found (${element?.status ?? "NO_RESULTS"})`);
    }
    return {
      origin: data.origin_addresses[0] ?? origin,
      destination: data.destination_addresses[0] ?? destination,
      mode,
      distance: { text: element.distance.text, meters: element.distance.value },
      duration: { text: element.duration.text, seconds: element.duration.value },
    };
  }

  async directions(origin: string, destination: string, mode: TravelMode): Promise<DirectionsResult> {
    const data = await this.get("directions", { origin, destination, mode }, directionsResponse);
    const route = data.routes[0];
    const leg = route?.legs[0];
    if (!route || !leg) {
      throw new UpstreamError("No route found (ZERO_RESULTS)");
    }
    return {
      summary: route.summary,
      startAddress: leg.start_address,
      endAddress: leg.end_address,
      mode,
      distance: { text: leg.distance.text, meters: leg.distance.value },
      duration: { text: leg.duration.text, seconds: leg.duration.value },
      steps: leg.steps.map((s) => ({
        instruction: htmlToText(s.html_instructions),
        distance: s.distance.text,
        duration: s.duration.text,
      })),
    };
  }

  /** Static Maps image URL carrying the API key; nothing is fetched. */
  staticMapUrl(center: string, zoom: number, size: string): string {
    const url = new URL(`${this.baseUrl}/staticmap`);
    url.searchParams.set("center", center);
    url.searchParams.set("zoom", String(zoom));
    url.searchParams.set("size", size);
    url.searchParams.set("markers", center);
    url.searchParams.set("key", this.apiKey);
    return url.toString();
  }

  private async get<T extends z.infer<typeof envelope>>(
    endpoint: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}/${endpoint}/json`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("key", this.apiKey);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    let body: unknown;
    try {
      const res = await this.fetchImpl(url, { signal: controller.signal });
      if (!res.ok) {
        throw new UpstreamError(`Maps ${endpoint} failed: HTTP ${res.status}`, res.status);
      }
      body = await res.json();
    } catch (error) {
      if (error instanceof UpstreamError) throw error;
      throw new UpstreamError(`Maps ${endpoint} failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(`Maps ${endpoint} returned an unexpected response`);
    }
    if (parsed.data.status !== "OK") {
      const detail = parsed.data.error_message ? `: ${parsed.data.error_message}` : "";
      throw new UpstreamError(`Maps ${endpoint} returned ${parsed.data.status}${detail}`);
    }
    return parsed.data;
  }
}
