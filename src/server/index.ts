/**
 * Commentator Entry Point.
 *
 * Connects a realtime voice session, streams the video's audio into it and
 * schedules spoken commentary. Track and detection events from the hosting
 * framework arrive on a WebSocket ingress.
 *
 * Usage:
 *   npx tsx src/server/index.ts --video match.mp4 --style roasting
 *   npx tsx src/server/index.ts --video match.mp4 --mock
 *
 * Settings are read from the environment (see src/config/env.ts) after
 * loading .env; command-line options override them.
 */

import 'dotenv/config';

import { createWriteStream, type WriteStream } from 'fs';
import { buildPromptSet, createCommentaryScheduler, hasObjectLabel } from '../commentary';
import { loadCommentatorConfig, loadInstructions, type CommentatorConfig } from '../config';
import { GeminiLiveSession, MockVoiceSession, SessionEventIngress } from '../live';
import { AudioFeeder, createFfmpegOpener } from '../media';
import { CommentaryOrchestrator, type VoiceSession } from '../session';
import { applyCliOptions, parseCliArgs, USAGE, type CliOptions } from './cli-args';
import { SessionLogger, generateSessionId } from './session-logger';

function printBanner(config: CommentatorConfig, mock: boolean): void {
  console.log('🎙️  Live Match Commentator');
  console.log(`   Video: ${config.videoPath ?? 'None'}`);
  console.log(`   Favorite Team: ${config.favTeam || 'None'}`);
  console.log(`   Teams: ${config.teams.team1} vs ${config.teams.team2}`);
  console.log(`   Knowledge Level: ${config.level}`);
  console.log(`   Style: ${config.style}`);
  console.log(`   Mode: ${config.mode}${mock ? ' (mock voice)' : ''}`);
  console.log();
}

/**
 * Creates and connects the voice session.
 */
async function connectVoiceSession(
  config: CommentatorConfig,
  options: CliOptions,
  instructions: string,
  logger: SessionLogger,
  output: WriteStream | null
): Promise<VoiceSession> {
  if (options.mock) {
    return new MockVoiceSession({ verbose: true });
  }

  if (!config.geminiApiKey) {
    throw new Error('GEMINI_API_KEY is required (or pass --mock)');
  }

  const session = new GeminiLiveSession({
    apiKey: config.geminiApiKey,
    instructions,
    ...(config.geminiModel ? { model: config.geminiModel } : {}),
  });

  session.subscribe((event) => {
    switch (event.type) {
      case 'audio':
        output?.write(event.data);
        break;
      case 'text':
        console.log(`[GeminiLive] ${event.text}`);
        break;
      case 'turn_complete':
        logger.debug('Model turn complete');
        break;
      case 'closed':
        logger.warning(`Live session closed (${event.code})`, event.reason);
        break;
    }
  });

  await session.connect();
  return session;
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = applyCliOptions(loadCommentatorConfig(), options);
  printBanner(config, options.mock);

  const sessionId = generateSessionId();
  const logger = new SessionLogger(sessionId, config.logsDir ?? undefined);
  console.log(`[Commentator] Session ${sessionId} logging to ${logger.getLogPath()}`);

  const instructions = loadInstructions({
    favTeam: config.favTeam,
    level: config.level,
    style: config.style,
    team1: config.teams.team1,
    team2: config.teams.team2,
    team1Color: config.team1Color,
    team2Color: config.team2Color,
  });

  const output = options.outputAudio ? createWriteStream(options.outputAudio) : null;
  const voice = await connectVoiceSession(config, options, instructions, logger, output);

  const scheduler = createCommentaryScheduler({
    mode: config.mode,
    sink: voice,
    prompts: buildPromptSet(config.style, config.level, config.teams),
    qualifies: hasObjectLabel(config.targetLabel, config.minConfidence),
    logger,
    event: { cooldownMs: config.cooldownMs, debounceMs: config.debounceMs },
  });

  const feeder = config.videoPath
    ? new AudioFeeder(config.videoPath, { open: createFfmpegOpener(), logger })
    : null;

  const orchestrator = new CommentaryOrchestrator({
    sessionId,
    audioSink: voice,
    feeder,
    scheduler,
    logger,
    videoPath: config.videoPath ?? undefined,
  });

  const ingress = new SessionEventIngress((event) => orchestrator.dispatch(event));

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    await orchestrator.end(reason);
    await ingress.stop();
    await voice.close();
    output?.end();
  };

  const shutdownAndReport = (reason: string, exitCode: number) => {
    shutdown(reason)
      .then(() => {
        process.exitCode = exitCode;
      })
      .catch((error: unknown) => {
        console.error('[Commentator] Shutdown failed:', error);
        process.exitCode = 1;
      });
  };

  orchestrator.onFailure((error) => shutdownAndReport(`failed: ${error.message}`, 1));
  process.once('SIGINT', () => shutdownAndReport('interrupted', 0));
  process.once('SIGTERM', () => shutdownAndReport('terminated', 0));

  await ingress.start(config.eventPort);

  // The video override is published as soon as the session is live
  await orchestrator.dispatch({ type: 'track_added', trackType: 'video' });
}

main().catch((error: unknown) => {
  console.error('[Commentator] Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
