import type { ParsedCall, ProtocolMarkers, MarkerOverrides } from '../schema/index.js';
import { protocolMarkersSchema } from '../schema/index.js';
import { DEFAULT_MARKERS } from '../config/defaults.js';
import { ProtocolError } from '../utils/errors.js';

// ── Markers ──────────────────────────────────────────────────

export function resolveMarkers(overrides?: MarkerOverrides): ProtocolMarkers {
  return protocolMarkersSchema.parse({
    begin: overrides?.begin ?? DEFAULT_MARKERS.begin,
    end: overrides?.end ?? DEFAULT_MARKERS.end,
    arg: overrides?.arg ?? DEFAULT_MARKERS.arg,
    value: overrides?.value ?? DEFAULT_MARKERS.value,
  });
}

/** The provider stops generating right at the END marker. */
export function stopSequence(markers: ProtocolMarkers): string {
  return markers.end;
}

// ── Template shown to the model ──────────────────────────────

export function renderResponseFormat(markers: ProtocolMarkers): string {
  return [
    'your_thoughts_here',
    '...',
    markers.begin,
    'function_name',
    markers.arg,
    'arg1_name',
    markers.value,
    'arg1_value (can be multiline)',
    markers.arg,
    'arg2_name',
    markers.value,
    'arg2_value (can be multiline)',
    '...',
    markers.end,
  ].join('\n');
}

export function encodeCall(
  call: Pick<ParsedCall, 'name' | 'arguments'> & { thought?: string },
  markers: ProtocolMarkers,
): string {
  const lines: string[] = [];
  if (call.thought !== undefined) lines.push(call.thought);
  lines.push(markers.begin, call.name);
  for (const [name, value] of Object.entries(call.arguments)) {
    lines.push(markers.arg, name, markers.value, value);
  }
  lines.push(markers.end);
  return lines.join('\n');
}

// ── Decoder ──────────────────────────────────────────────────

/**
 * Last occurrence of `marker` lying entirely inside `[start, end)`, or -1.
 */
function findLast(text: string, marker: string, start: number, end: number): number {
  const from = end - marker.length;
  if (from < start) return -1;
  const index = text.lastIndexOf(marker, from);
  return index >= start ? index : -1;
}

/**
 * Decode the final call block of a model response.
 *
 * Every marker is located from the tail backwards, so abandoned or quoted
 * blocks earlier in the text never shadow the last complete one. Argument
 * blocks are consumed last-to-first with overwriting writes, which means
 * that on a repeated argument name the block nearest BEGIN wins.
 *
 * @throws ProtocolError with one of the four decode failure kinds
 */
export function decodeCall(text: string, markers: ProtocolMarkers): ParsedCall {
  const endIndex = findLast(text, markers.end, 0, text.length);
  if (endIndex === -1) throw new ProtocolError('missing_end');

  const beginIndex = findLast(text, markers.begin, 0, endIndex);
  if (beginIndex === -1) throw new ProtocolError('missing_begin');

  const thought = text.slice(0, beginIndex).trim();
  const contentStart = beginIndex + markers.begin.length;

  const args = new Map<string, string>();
  let boundary = endIndex;

  for (;;) {
    const argIndex = findLast(text, markers.arg, contentStart, boundary);
    if (argIndex === -1) break;

    const nameStart = argIndex + markers.arg.length;
    const valueIndex = findLast(text, markers.value, nameStart, boundary);
    if (valueIndex === -1) throw new ProtocolError('malformed_block');

    const argName = text.slice(nameStart, valueIndex).trim();
    const value = text.slice(valueIndex + markers.value.length, boundary).trim();
    args.set(argName, value);

    boundary = argIndex;
  }

  const name = text
    .slice(contentStart, boundary)
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (name === undefined) throw new ProtocolError('missing_name');

  return { thought, name, arguments: Object.fromEntries(args) };
}
