import type { RawInput, SourceOption } from "./types.js";

interface SourceEntry {
  id: string;
  label: string;
}

/**
 * Naim input ids (the last segment of an input's ussi) → canonical source.
 * Ids missing here pass through unchanged so inputs added by newer firmware
 * stay selectable and displayable.
 */
export const SOURCE_TABLE: Readonly<Record<string, SourceEntry>> = {
  ana1: { id: "analog_1", label: "Analogue 1" },
  ana2: { id: "analog_2", label: "Analogue 2" },
  ana3: { id: "analog_3", label: "Analogue 3" },
  ana4: { id: "analog_4", label: "Analogue 4" },
  dig1: { id: "digital_1", label: "Digital 1" },
  dig2: { id: "digital_2", label: "Digital 2" },
  dig3: { id: "digital_3", label: "Digital 3" },
  dig4: { id: "digital_4", label: "Digital 4" },
  dig5: { id: "digital_5", label: "Digital 5" },
  hdmi: { id: "hdmi", label: "HDMI" },
  bluetooth: { id: "bluetooth", label: "Bluetooth" },
  radio: { id: "radio", label: "Internet Radio" },
  spotify: { id: "spotify", label: "Spotify" },
  tidal: { id: "tidal", label: "TIDAL" },
  qobuz: { id: "qobuz", label: "Qobuz" },
  usb: { id: "usb", label: "USB" },
  airplay: { id: "airplay", label: "AirPlay" },
  gcast: { id: "chromecast", label: "Chromecast" },
  upnp: { id: "upnp", label: "UPnP/Servers" },
  playqueue: { id: "playqueue", label: "Play Queue" },
  files: { id: "files", label: "Local Files" },
  multiroom: { id: "multiroom", label: "Multi-room" },
};

const VENDOR_BY_CANONICAL = new Map<string, string>(
  Object.entries(SOURCE_TABLE).map(([vendorId, entry]) => [entry.id, vendorId]),
);

/** Strip the `inputs/` ussi prefix: "inputs/ana1" → "ana1". */
export function vendorSourceId(raw: string): string {
  const trimmed = raw.trim();
  const slash = trimmed.lastIndexOf("/");
  return slash >= 0 ? trimmed.slice(slash + 1) : trimmed;
}

function tableEntry(vendorId: string): SourceEntry | undefined {
  const key = vendorId.toLowerCase();
  return Object.hasOwn(SOURCE_TABLE, key) ? SOURCE_TABLE[key] : undefined;
}

export function canonicalSource(vendorId: string): string {
  return tableEntry(vendorId)?.id ?? vendorId;
}

export function vendorIdFor(source: string): string {
  return VENDOR_BY_CANONICAL.get(source) ?? source;
}

export function sourceLabel(source: string): string {
  return tableEntry(vendorIdFor(source))?.label ?? source;
}

/**
 * Build the selectable source list from a `/inputs` payload. Disabled
 * inputs are dropped; inputs without an `inputs/` ussi are not sources.
 */
export function parseInputs(inputs: RawInput[]): SourceOption[] {
  const options: SourceOption[] = [];
  for (const input of inputs) {
    if (typeof input.ussi !== "string" || !input.ussi.startsWith("inputs/")) continue;
    if (input.disabled === "1") continue;

    const vendorId = vendorSourceId(input.ussi);
    if (!vendorId) continue;
    const id = canonicalSource(vendorId);
    const name = typeof input.name === "string" && input.name.trim() ? input.name.trim() : sourceLabel(id);
    options.push({ id, vendorId, label: name, selectable: input.selectable === "1" });
  }
  return options;
}
