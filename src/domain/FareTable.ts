// Fare table: train fares by route plus fixed fares per transport type

import fs from "fs/promises";
import { z } from "zod";
import { err, ok, type Result } from "../utils/result.js";
import { normalizeStation, normalizeTransport, type TransportType } from "./transport.js";

const FareDataSchema = z.object({
  trainFares: z.array(
    z.object({
      departure: z.string().min(1),
      destination: z.string().min(1),
      fare: z.number().int().positive(),
    })
  ),
  fixedFares: z.object({
    bus: z.number().int().positive(),
    taxi: z.number().int().positive(),
    airplane: z.number().int().positive(),
  }),
});

export type FareData = z.infer<typeof FareDataSchema>;

export interface FareQuote {
  fare: number;
  transportType: TransportType;
  source: "route" | "fixed";
}

export class FareTable {
  private trainFares = new Map<string, number>();

  private constructor(private data: FareData) {
    for (const entry of data.trainFares) {
      this.trainFares.set(routeKey(entry.departure, entry.destination), entry.fare);
    }
  }

  static fromData(input: unknown): FareTable {
    const parsed = FareDataSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
      throw new Error(`Invalid fare data: ${issues}`);
    }
    return new FareTable(parsed.data);
  }

  static async load(filePath: string): Promise<FareTable> {
    const content = await fs.readFile(filePath, "utf-8");
    return FareTable.fromData(JSON.parse(content));
  }

  /**
   * Train fares are looked up by exact direction; other transport types
   * have one fixed fare regardless of route.
   */
  lookup(departure: string, destination: string, transport: string): Result<FareQuote, string> {
    const transportType = normalizeTransport(transport);
    if (!transportType) {
      return err(`Unknown transport type "${transport}". Use train, bus, taxi or airplane.`);
    }

    if (transportType !== "train") {
      return ok({ fare: this.data.fixedFares[transportType], transportType, source: "fixed" });
    }

    const fare = this.trainFares.get(routeKey(departure, destination));
    if (fare === undefined) {
      return err(`No train fare found from ${normalizeStation(departure)} to ${normalizeStation(destination)}. Please enter the fare manually.`);
    }
    return ok({ fare, transportType, source: "route" });
  }

  stations(): string[] {
    const names = new Set<string>();
    for (const entry of this.data.trainFares) {
      names.add(normalizeStation(entry.departure));
      names.add(normalizeStation(entry.destination));
    }
    return Array.from(names);
  }
}

function routeKey(departure: string, destination: string): string {
  return `${normalizeStation(departure)}→${normalizeStation(destination)}`;
}
