import { z } from "zod";
import type { MapsClient } from "../google/maps.js";
import { defineTool } from "./registry.js";
import type { Tool } from "./registry.js";

const mode = z
  .enum(["driving", "walking", "bicycling", "transit"])
  .default("driving")
  .describe("Travel mode (default: driving)");

const route = {
  origin: z.string().min(1).describe("Start address or lat,lng"),
  destination: z.string().min(1).describe("End address or lat,lng"),
  mode,
};

/** Maps tools; registered with either backend when an API key is configured. */
export function mapsTools(maps: MapsClient): Tool[] {
  return [
    defineTool({
      name: "maps_geocode",
      description: "Look up coordinates for an address",
      args: {
        address: z.string().min(1).describe("Address to geocode"),
      },
      run: async ({ address }) => ({ address, results: await maps.geocode(address) }),
    }),
    defineTool({
      name: "maps_distance",
      description: "Travel distance and time between two places",
      args: route,
      run: ({ origin, destination, mode }) => maps.distance(origin, destination, mode),
    }),
    defineTool({
      name: "maps_directions",
      description: "Step-by-step directions between two places",
      args: route,
      run: ({ origin, destination, mode }) => maps.directions(origin, destination, mode),
    }),
    defineTool({
      name: "maps_static_map",
      description:
        "Build a Static Maps image URL centred on a place. The URL embeds the Maps API key; do not share it outside trusted clients",
      args: {
        center: z.string().min(1).describe("Address or lat,lng to centre on"),
        zoom: z.number().int().min(0).max(21).default(13).describe("Zoom level 0-21 (default: 13)"),
        size: z
          .string()
          .regex(/^\d{1,4}x\d{1,4}$/, "size must look like 600x400")
          .default("600x400")
          .describe("Image size WIDTHxHEIGHT (default: 600x400)"),
      },
      run: async ({ center, zoom, size }) => ({
        center,
        zoom,
        size,
        url: maps.staticMapUrl(center, zoom, size),
      }),
    }),
  ];
}
