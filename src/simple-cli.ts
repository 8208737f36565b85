#!/usr/bin/env node

import * as readline from 'readline';
import { randomUUID } from 'crypto';
import { ConfigManager } from './lib/ConfigManager';
import { createApplication } from './lib/bootstrap';
import { TurnCancelledError } from './lib/errors';

async function main() {
  console.log('Starting Constraint Chef...');

  const configManager = ConfigManager.getInstance();
  const validation = configManager.validateConfig();

  if (!validation.isValid) {
    console.error('Configuration is invalid:');
    validation.errors.forEach(error => console.error(`  - ${error}`));
    process.exit(1);
  }

  const app = await createApplication(configManager);
  const sessionId = randomUUID();

  console.log('\nChef: Welcome! Tell me your diet, what you have and what to avoid, then ask for a recipe.');
  console.log('I can also answer food-safety questions, conversions and substitutions.\n');
  console.log('Type "exit" or press Ctrl+C to quit; Ctrl+C while I am thinking cancels that message.\n');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'You: '
  });

  let current: AbortController | null = null;
  rl.prompt();

  rl.on('line', async input => {
    const utterance = input.trim();

    if (utterance === 'exit' || utterance === 'quit') {
      rl.close();
      return;
    }

    if (utterance === '') {
      rl.prompt();
      return;
    }

    current = new AbortController();
    try {
      const response = await app.orchestrator.processTurn({ sessionId, utterance }, current.signal);
      console.log(`\nChef: ${response.text}`);
      response.disclosures.forEach(disclosure => console.log(`(note: ${disclosure})`));
      if (response.constraints.length > 0) {
        console.log(`\n[constraints] ${response.constraints.join(' | ')}`);
      }
      console.log('');
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        console.log('\nCancelled; nothing from that message was saved.\n');
      } else {
        console.error(`\nFailed: ${error instanceof Error ? error.message : 'unknown error'}\n`);
      }
    } finally {
      current = null;
    }

    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    app.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  });

  rl.on('SIGINT', () => {
    if (current) {
      current.abort();
      return;
    }
    rl.close();
  });
}

// Handle graceful shutdown
process.on('SIGTERM', () => {
  console.log('\nGoodbye!');
  process.exit(0);
});

main().catch(error => {
  console.error('Failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
