/**
 * Tests for session event validation.
 */

import { describe, it, expect } from 'vitest';
import { parseSessionEvent } from '../events';

describe('parseSessionEvent', () => {
  it('should parse track events', () => {
    expect(parseSessionEvent({ type: 'track_added', trackType: 'video' })).toEqual({
      type: 'track_added',
      trackType: 'video',
    });
  });

  it('should reject an unknown track type', () => {
    expect(parseSessionEvent({ type: 'track_added', trackType: 'screen' })).toBeNull();
  });

  it('should parse detections with optional bounding boxes', () => {
    const event = parseSessionEvent({
      type: 'detection',
      objects: [
        { label: 'person', confidence: 0.92, bbox: [10, 20, 110, 220] },
        { label: 'ball', confidence: 0.4 },
      ],
      frameId: 17,
    });

    expect(event).toEqual({
      type: 'detection',
      objects: [
        { label: 'person', confidence: 0.92, bbox: [10, 20, 110, 220] },
        { label: 'ball', confidence: 0.4 },
      ],
    });
  });

  it('should accept an empty detection', () => {
    expect(parseSessionEvent({ type: 'detection', objects: [] })).toEqual({ type: 'detection', objects: [] });
  });

  it('should reject a detection containing a malformed object', () => {
    expect(parseSessionEvent({ type: 'detection', objects: [{ label: 'person', confidence: 0.9 }, { label: '' }] })).toBeNull();
    expect(parseSessionEvent({ type: 'detection', objects: [{ label: 'person', confidence: '0.9' }] })).toBeNull();
    expect(parseSessionEvent({ type: 'detection', objects: [{ label: 'person', confidence: 1, bbox: [1, 2] }] })).toBeNull();
  });

  it('should reject values that are not events', () => {
    expect(parseSessionEvent(null)).toBeNull();
    expect(parseSessionEvent([])).toBeNull();
    expect(parseSessionEvent({ type: 'unknown' })).toBeNull();
    expect(parseSessionEvent({ type: 'detection' })).toBeNull();
  });
});
