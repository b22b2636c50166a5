/**
 * Tests for MockVoiceSession.
 */

import { describe, it, expect } from 'vitest';
import { MockVoiceSession } from '../mock-voice-session';

describe('MockVoiceSession', () => {
  it('should record prompts and count audio while connected', async () => {
    const session = new MockVoiceSession();
    await session.sendPrompt('Welcome!');
    await session.sendAudio(Buffer.alloc(640), 'audio/pcm;rate=16000');
    await session.sendAudio(Buffer.alloc(320), 'audio/pcm;rate=16000');

    expect(session.connected).toBe(true);
    expect(session.prompts).toEqual(['Welcome!']);
    expect(session.audioChunks()).toBe(2);
    expect(session.audioBytes()).toBe(960);
    expect([...session.mimeTypes]).toEqual(['audio/pcm;rate=16000']);
  });

  it('should keep only the most recent audio chunks', async () => {
    const session = new MockVoiceSession({ recentAudioLimit: 2 });
    for (let i = 1; i <= 1000; i++) {
      await session.sendAudio(Buffer.from([i % 256, 0]), 'audio/pcm;rate=16000');
    }

    expect(session.recentAudio.map((chunk) => chunk[0])).toEqual([999 % 256, 1000 % 256]);
    expect(session.audioChunks()).toBe(1000);
    expect(session.audioBytes()).toBe(2000);
  });

  it('should keep no audio when the limit is zero', async () => {
    const session = new MockVoiceSession({ recentAudioLimit: 0 });
    await session.sendAudio(Buffer.alloc(4), 'audio/pcm;rate=16000');

    expect(session.recentAudio).toEqual([]);
    expect(session.audioBytes()).toBe(4);
  });

  it('should disconnect on close', async () => {
    const session = new MockVoiceSession();
    await session.close();
    expect(session.connected).toBe(false);
  });
});
