import { NOT_SPECIFIED } from './types';

function toByte(channel: number): number {
  const clamped = Number.isFinite(channel) ? Math.min(1, Math.max(0, channel)) : 0;
  return Math.round(clamped * 255);
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

/**
 * Convert a 0..1 stroke colour (gray or RGB) to a #rrggbb code.
 * Missing colours give NOT_SPECIFIED; unexpected channel counts are echoed back
 * in brackets so they can never be mistaken for a hex code.
 */
export function toHex(channels?: readonly number[] | null): string {
  if (!channels || channels.length === 0) return NOT_SPECIFIED;

  if (channels.length === 3) {
    return '#' + channels.map((c) => hexByte(toByte(c))).join('');
  }

  if (channels.length === 1) {
    const gray = hexByte(toByte(channels[0]));
    return `#${gray}${gray}${gray}`;
  }

  return `[${channels.join(', ')}]`;
}
