#!/usr/bin/env node

import React from 'react';
import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { render } from 'ink';
import { ChatInterface } from './components/ChatInterface';
import { ConfigManager } from './lib/ConfigManager';
import { createApplication } from './lib/bootstrap';
import { setSilenced } from './lib/logger';

async function main() {
  console.log('Starting Constraint Chef...');

  const configManager = ConfigManager.getInstance();
  const validation = configManager.validateConfig();

  if (!validation.isValid) {
    console.error('Configuration is invalid:');
    validation.errors.forEach(error => console.error(`  - ${error}`));
    process.exit(1);
  }

  const phases = new EventEmitter();
  const app = await createApplication(configManager, {
    onPhaseChange: change => phases.emit('phase', change)
  });

  const counts = app.knowledgeBase.getCounts();
  console.log(`Loaded ${counts.recipes} recipes and ${counts.safetyRules} safety rules.\n`);

  // From here on ink owns the terminal
  setSilenced(true);
  const { waitUntilExit } = render(
    <ChatInterface orchestrator={app.orchestrator} sessionId={randomUUID()} phases={phases} />
  );

  await waitUntilExit();
  setSilenced(false);
  await app.close();
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
