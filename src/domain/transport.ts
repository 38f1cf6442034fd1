// Transport types and station name handling

export const TRANSPORT_TYPES = ["train", "bus", "taxi", "airplane"] as const;

export type TransportType = (typeof TRANSPORT_TYPES)[number];

const TRANSPORT_ALIASES: Record<string, TransportType> = {
  train: "train",
  rail: "train",
  subway: "train",
  電車: "train",
  鉄道: "train",
  地下鉄: "train",
  bus: "bus",
  バス: "bus",
  taxi: "taxi",
  cab: "taxi",
  タクシー: "taxi",
  airplane: "airplane",
  plane: "airplane",
  flight: "airplane",
  飛行機: "airplane",
};

export function normalizeTransport(value: string): TransportType | undefined {
  return TRANSPORT_ALIASES[value.trim().toLowerCase()];
}

/**
 * "上野駅 " and "上野" name the same station.
 */
export function normalizeStation(name: string): string {
  return name.trim().replace(/駅$/, "").trim();
}

export function isCommuterRoute(
  departure: string,
  destination: string,
  routes: ReadonlyArray<readonly [string, string]>
): boolean {
  const from = normalizeStation(departure);
  const to = normalizeStation(destination);
  return routes.some(([a, b]) => {
    const x = normalizeStation(a);
    const y = normalizeStation(b);
    return (from === x && to === y) || (from === y && to === x);
  });
}
