import { Command } from 'commander';
import { loadConfig, resolveGatewayConfig, type Config } from './config.js';
import type { GatewayConfig } from './sonos/types.js';

export interface CliOptions {
  gateway: GatewayConfig;
  room?: string;
  trackUrl?: string;
  listSpeakers: boolean;
  state: boolean;
  json: boolean;
}

interface RawOptions {
  room?: string;
  sonosApi: string;
  fileServer: string;
  playMode: string;
  listSpeakers: boolean;
  state: boolean;
  json: boolean;
}

export function parseArgs(
  argv: readonly string[] = process.argv,
  config: Config = loadConfig()
): CliOptions {
  const program = new Command();

  program
    .name('sonos-gateway')
    .description('Play tracks from a file share on Sonos speakers via node-sonos-http-api')
    .version('1.0.0')
    .argument('[trackUrl]', 'Media server URL of the track to play')
    .option('-r, --room <room>', 'Sonos speaker name', config.defaultRoom)
    .option('-s, --sonos-api <url>', 'Sonos HTTP API URL', config.apiUrl)
    .option('-f, --file-server <server>', 'File share host and path for x-file-cifs URIs', config.fileServer)
    .option('-m, --play-mode <mode>', 'How tracks are handed to Sonos: share, clip', config.playMode)
    .option('-l, --list-speakers', 'Show available Sonos speakers', false)
    .option('--state', 'Show what the speaker is playing', false)
    .option('--json', 'Print results as JSON', false);

  program.parse([...argv]);

  const options = program.opts<RawOptions>();

  return {
    gateway: resolveGatewayConfig({
      apiUrl: options.sonosApi,
      fileServer: options.fileServer,
      playMode: options.playMode,
      requestTimeoutMs: config.requestTimeoutMs,
    }),
    room: options.room,
    trackUrl: program.args[0],
    listSpeakers: options.listSpeakers,
    state: options.state,
    json: options.json,
  };
}
