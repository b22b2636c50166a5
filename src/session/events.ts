/**
 * Validation for session events arriving from outside the process.
 */

import type { DetectedObject, SessionEvent, TrackType } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTrackType(value: unknown): value is TrackType {
  return value === 'audio' || value === 'video';
}

function isBBox(value: unknown): value is [number, number, number, number] {
  return Array.isArray(value) && value.length === 4 && value.every((n) => typeof n === 'number' && Number.isFinite(n));
}

function parseDetectedObject(value: unknown): DetectedObject | null {
  if (!isRecord(value)) return null;
  const { label, confidence, bbox } = value;
  if (typeof label !== 'string' || label.length === 0) return null;
  if (typeof confidence !== 'number' || !Number.isFinite(confidence)) return null;

  const obj: DetectedObject = { label, confidence };
  if (bbox !== undefined) {
    if (!isBBox(bbox)) return null;
    obj.bbox = bbox;
  }
  return obj;
}

/**
 * Parses a decoded JSON value into a SessionEvent.
 * Returns null if the value is not a well-formed event.
 */
export function parseSessionEvent(value: unknown): SessionEvent | null {
  if (!isRecord(value)) return null;

  switch (value.type) {
    case 'track_added':
      return isTrackType(value.trackType) ? { type: 'track_added', trackType: value.trackType } : null;

    case 'detection': {
      if (!Array.isArray(value.objects)) return null;
      const objects: DetectedObject[] = [];
      for (const raw of value.objects) {
        const obj = parseDetectedObject(raw);
        if (!obj) return null;
        objects.push(obj);
      }
      return { type: 'detection', objects };
    }

    default:
      return null;
  }
}
