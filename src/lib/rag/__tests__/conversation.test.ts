/**
 * Tests for conversation history.
 */

import { describe, it, expect } from 'vitest';
import { Conversation } from '../conversation';
import { InvalidInputError } from '@/lib/errors';

const FIXED_TIME = new Date('2025-03-01T10:00:00Z');

describe('Conversation', () => {
  it('should append turns in order', () => {
    const conversation = new Conversation(1, () => FIXED_TIME);

    conversation.addUserTurn('What was the rent?');
    conversation.addAssistantTurn('1,200 EUR per month.', { confidence: 0.82 });

    expect(conversation.getTurns()).toEqual([
      { role: 'user', content: 'What was the rent?', timestamp: FIXED_TIME },
      {
        role: 'assistant',
        content: '1,200 EUR per month.',
        timestamp: FIXED_TIME,
        sources: [],
        confidence: 0.82,
      },
    ]);
    expect(conversation.length).toBe(2);
  });

  it('should replay only the last five turns by default', () => {
    const conversation = new Conversation(1);
    for (let i = 0; i < 8; i++) {
      conversation.addUserTurn(`Question ${i}`);
    }

    expect(conversation.recentTurns().map((t) => t.content)).toEqual([
      'Question 3',
      'Question 4',
      'Question 5',
      'Question 6',
      'Question 7',
    ]);
  });

  it('should convert recent turns to chat messages', () => {
    const conversation = new Conversation(1);
    conversation.addUserTurn('First question');
    conversation.addAssistantTurn('First answer');
    conversation.addUserTurn('Second question');

    expect(conversation.toMessages(2)).toEqual([
      { role: 'assistant', content: 'First answer' },
      { role: 'user', content: 'Second question' },
    ]);
  });

  it('should return no turns for a non-positive count', () => {
    const conversation = new Conversation(1);
    conversation.addUserTurn('First question');

    expect(conversation.recentTurns(0)).toEqual([]);
  });

  it('should not expose its internal list', () => {
    const conversation = new Conversation(1);
    conversation.addUserTurn('First question');

    conversation.getTurns().pop();

    expect(conversation.length).toBe(1);
  });

  it('should reject blank turns', () => {
    const conversation = new Conversation(1);
    expect(() => conversation.addUserTurn('   ')).toThrow(InvalidInputError);
  });
});
