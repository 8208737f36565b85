import React, { useState, useEffect, useCallback, useRef } from 'react';
import { EventEmitter } from 'events';
import { Box, Text, useInput, useApp, Key } from 'ink';
import TextInput from 'ink-text-input';
import { Message, TurnPhase } from '../types';
import { DialogueOrchestrator, PhaseChange } from '../lib/DialogueOrchestrator';
import { TurnCancelledError } from '../lib/errors';

interface ChatInterfaceProps {
  orchestrator: DialogueOrchestrator;
  sessionId: string;
  phases: EventEmitter;
}

const WELCOME =
  "Welcome! I'm your cooking assistant.\n\nTell me about your diet, what you have in the kitchen or want to avoid, and ask for a recipe whenever you're ready. For example:\n- I'm vegan and I have oats and bananas\n- No peanuts please\n- Suggest a breakfast";

const PHASE_STATUS: Record<TurnPhase, string> = {
  idle: 'Ready',
  classifying: 'Reading your message...',
  merging: 'Updating your constraints...',
  retrieving: 'Looking up recipes and safety rules...',
  generating: 'Writing...',
  validating: 'Checking the recipe against your constraints...',
  responding: 'Saving...',
  failed: 'Something went wrong'
};

export const ChatInterface: React.FC<ChatInterfaceProps> = ({ orchestrator, sessionId, phases }) => {
  const { exit } = useApp();
  const [messages, setMessages] = useState<Message[]>([
    { role: 'assistant', content: WELCOME, timestamp: new Date().toISOString() }
  ]);
  const [input, setInput] = useState('');
  const [isLoading, setIsLoading] = useState(false);
  const [statusMessage, setStatusMessage] = useState('Type a message to start...');
  const [constraints, setConstraints] = useState<string[]>([]);
  const [disclosures, setDisclosures] = useState<string[]>([]);
  const turnController = useRef<AbortController | null>(null);

  useEffect(() => {
    const onPhase = (change: PhaseChange) => setStatusMessage(PHASE_STATUS[change.to]);
    phases.on('phase', onPhase);
    return () => {
      phases.off('phase', onPhase);
    };
  }, [phases]);

  useInput((value: string, key: Key) => {
    if (key.escape && turnController.current) {
      turnController.current.abort();
      return;
    }
    if (key.escape || (key.ctrl && value === 'c')) {
      exit();
    }
  });

  const handleSubmit = useCallback(async () => {
    const utterance = input.trim();
    if (utterance === '' || isLoading) return;

    setMessages(prev => [...prev, { role: 'user', content: utterance, timestamp: new Date().toISOString() }]);
    setInput('');
    setIsLoading(true);

    const controller = new AbortController();
    turnController.current = controller;

    try {
      const response = await orchestrator.processTurn({ sessionId, utterance }, controller.signal);
      setMessages(prev => [...prev, { role: 'assistant', content: response.text, timestamp: new Date().toISOString() }]);
      setConstraints(response.constraints);
      setDisclosures(response.disclosures);
      setStatusMessage(response.verdict === 'accepted' ? 'Ready' : `Ready (last answer: ${response.verdict})`);
    } catch (error) {
      const content =
        error instanceof TurnCancelledError
          ? 'Cancelled. Nothing from that message was saved.'
          : `Sorry, something went wrong: ${error instanceof Error ? error.message : 'unknown error'}`;
      setMessages(prev => [...prev, { role: 'assistant', content, timestamp: new Date().toISOString() }]);
      setStatusMessage('Ready');
    } finally {
      turnController.current = null;
      setIsLoading(false);
    }
  }, [input, isLoading, orchestrator, sessionId]);

  const formatMessage = (message: Message): string => {
    const time = new Date(message.timestamp).toLocaleTimeString('en-US', {
      hour: '2-digit',
      minute: '2-digit'
    });
    const prefix = message.role === 'user' ? 'You' : 'Chef';
    return `[${time}] ${prefix}: ${message.content}`;
  };

  return (
    <Box flexDirection="column" height="100%">
      {/* Header */}
      <Box borderStyle="double" borderColor="green" padding={1} marginBottom={1}>
        <Text bold color="green">
          Constraint Chef
        </Text>
      </Box>

      {/* Active constraints */}
      <Box borderStyle="single" borderColor="magenta" paddingX={1} marginBottom={1} flexDirection="column">
        <Text color="magenta" bold>
          Constraints
        </Text>
        {constraints.length === 0 ? (
          <Text color="gray">none yet</Text>
        ) : (
          constraints.map(line => <Text key={line}>{line}</Text>)
        )}
      </Box>

      {/* Messages Area */}
      <Box flexDirection="column" flexGrow={1} marginBottom={1} paddingX={1}>
        {messages.map((message, index) => (
          <Box key={index} marginBottom={1}>
            <Text wrap="wrap" color={message.role === 'user' ? 'cyan' : 'white'}>
              {formatMessage(message)}
            </Text>
          </Box>
        ))}
        {disclosures.map(disclosure => (
          <Text key={disclosure} color="yellow">
            Note: {disclosure}
          </Text>
        ))}
        {isLoading && (
          <Box>
            <Text color="yellow">{statusMessage} (Esc to cancel)</Text>
          </Box>
        )}
      </Box>

      {/* Input Area */}
      <Box borderStyle="single" borderColor="blue" padding={1}>
        <Box flexDirection="column" width="100%">
          <Box marginBottom={1}>
            <Text color="blue" bold>
              Message:{' '}
            </Text>
            <TextInput
              value={input}
              onChange={setInput}
              onSubmit={handleSubmit}
              placeholder="Tell me what you'd like..."
              focus={!isLoading}
            />
          </Box>
          <Box>
            <Text color="gray" dimColor>
              Status: {statusMessage} | Esc or Ctrl+C to quit
            </Text>
          </Box>
        </Box>
      </Box>
    </Box>
  );
};

export default ChatInterface;
