#!/usr/bin/env node

import chalk from 'chalk';
import { parseArgs, type CliOptions } from './cli.js';
import { printSetupInstructions } from './setup.js';
import { SonosGateway } from './sonos/gateway.js';
import type { PlaybackState, SpeakerDescriptor } from './sonos/types.js';

function formatSeconds(total: number): string {
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

function printSpeakers(speakers: SpeakerDescriptor[]): void {
  console.log(chalk.bold('Available Sonos speakers:'));
  speakers.forEach((speaker) => {
    const volume = speaker.volume !== undefined ? chalk.gray(` (volume ${speaker.volume})`) : '';
    console.log(`  - ${speaker.name}${volume}`);
  });
}

function printState(room: string, state: PlaybackState): void {
  const status = state.isPlaying ? chalk.green('Playing') : chalk.yellow('Not playing');
  console.log(`${chalk.bold(room)}: ${status}`);
  if (state.title || state.artist) {
    console.log(`  ${state.artist ?? 'Unknown artist'} - ${state.title ?? 'Unknown title'}`);
  }
  if (state.position !== undefined || state.duration !== undefined) {
    const position = state.position !== undefined ? formatSeconds(state.position) : '-';
    const duration = state.duration !== undefined ? formatSeconds(state.duration) : '-';
    console.log(chalk.gray(`  ${position} / ${duration}`));
  }
}

async function resolveRoom(gateway: SonosGateway, options: CliOptions): Promise<string> {
  if (options.room) {
    return options.room;
  }
  const speakers = await gateway.listSpeakers();
  if (speakers.length === 0) {
    throw new Error('No Sonos speakers found');
  }
  return speakers[0].id;
}

async function main(): Promise<void> {
  const options = parseArgs();
  const gateway = new SonosGateway(options.gateway);

  if (!options.listSpeakers && !options.state && !options.trackUrl) {
    console.error(chalk.red('Please provide a track URL or an action, e.g.:'));
    console.error(chalk.cyan('  sonos-gateway http://media.local:5050/api/v8/audio/Album%2FSong.mp3'));
    console.error(chalk.cyan('  sonos-gateway --list-speakers'));
    console.error(chalk.cyan('  sonos-gateway --state --room Kitchen'));
    console.error(chalk.gray('\nOr use --help for more options'));
    process.exit(1);
  }

  const connected = await gateway.checkConnection();
  if (!connected) {
    printSetupInstructions(gateway.settings.apiUrl);
    process.exit(1);
  }

  if (options.listSpeakers) {
    const speakers = await gateway.listSpeakers();
    if (options.json) {
      console.log(JSON.stringify(speakers, null, 2));
    } else {
      printSpeakers(speakers);
    }
    return;
  }

  let room: string;
  try {
    room = await resolveRoom(gateway, options);
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  }

  if (options.state) {
    const state = await gateway.getState(room);
    if (options.json) {
      console.log(JSON.stringify(state, null, 2));
    } else {
      printState(room, state);
    }
    return;
  }

  if (options.trackUrl) {
    if (!options.json) {
      console.log(chalk.gray(`Using speaker: ${room} (${gateway.settings.playMode} mode)\n`));
    }
    const result = await gateway.playTrack(room, options.trackUrl);
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.success) {
      console.log(chalk.green(result.message));
    } else {
      console.error(chalk.red(result.message));
    }
    if (!result.success) {
      process.exitCode = 1;
    }
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
