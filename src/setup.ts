import chalk from 'chalk';

const API_REPO_URL = 'https://github.com/jishi/node-sonos-http-api';

export function printSetupInstructions(apiUrl: string): void {
  console.log(chalk.red(`Could not connect to node-sonos-http-api at ${apiUrl}\n`));
  console.log(chalk.white('The Sonos HTTP API service needs to be running.'));
  console.log(chalk.white('Install and start it with:\n'));
  console.log(chalk.cyan(`  git clone ${API_REPO_URL}.git`));
  console.log(chalk.cyan('  cd node-sonos-http-api && npm install && node server.js\n'));
  console.log(
    chalk.white('Then point SONOS_API_URL (or --sonos-api) at it.')
  );
}
