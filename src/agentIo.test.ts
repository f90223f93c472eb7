import test from 'node:test';
import assert from 'node:assert/strict';
import { AgentIO, matchChoice, matchSkip, type ChoiceRequest } from './agentIo.js';
import { ScriptedAgent } from './testing/fakes.js';
import { logger } from './logger.js';

logger.setConsoleOutputEnabled(false);

const req: ChoiceRequest = {
  kind: 'vigilante_shoot',
  prompt: 'Shoot someone?',
  options: ["Skip (don't kill anyone tonight)", 'Alice', 'Bob'],
  context: '',
};

test('matchChoice: exact, then case-insensitive, with quotes stripped', () => {
  assert.equal(matchChoice('Alice', ['Alice', 'Bob']), 'Alice');
  assert.equal(matchChoice(' "bob" ', ['Alice', 'Bob']), 'Bob');
  assert.equal(matchChoice('Carol', ['Alice', 'Bob']), undefined);
});

test('matchSkip: skip-like free text maps to the skip option only when one exists', () => {
  assert.equal(matchSkip("I'll pass tonight", req.options), "Skip (don't kill anyone tonight)");
  assert.equal(matchSkip('Let us wait and see', req.options), "Skip (don't kill anyone tonight)");
  assert.equal(matchSkip('pass', ['Alice', 'Bob']), undefined);
  assert.equal(matchSkip('Alice', req.options), undefined);
});

test('chooseWithReasoning: recognizes skip wording', async () => {
  const io = new AgentIO({ Vic: new ScriptedAgent([{ choice: 'I will hold my fire', reasoning: 'unsure' }]) });
  const out = await io.chooseWithReasoning('Vic', req);
  assert.deepEqual(out, { choice: "Skip (don't kill anyone tonight)", reasoning: 'unsure' });
});

test('choose: does not apply skip wording and falls back to the first option', async () => {
  const io = new AgentIO(
    { Vic: new ScriptedAgent([{ choice: 'pass', reasoning: '' }, { choice: 'pass', reasoning: '' }]) },
    { maxAttempts: 2 }
  );
  assert.equal(await io.choose('Vic', req), "Skip (don't kill anyone tonight)");
});

test('choose: retries after an error and accepts a later valid answer', async () => {
  const agent = new ScriptedAgent([new Error('rate limited'), { choice: 'bob', reasoning: '' }]);
  const io = new AgentIO({ Vic: agent }, { maxAttempts: 2 });
  assert.equal(await io.choose('Vic', req), 'Bob');
  assert.equal(agent.choiceCalls, 2);
});

test('choose: exhausting attempts lands on the first valid choice', async () => {
  const io = new AgentIO({ Vic: new ScriptedAgent([new Error('boom')]) }, { maxAttempts: 1 });
  assert.equal(await io.choose('Vic', { ...req, options: ['Alice', 'Bob'] }), 'Alice');
});

test('choose: unknown player gets the fallback', async () => {
  const io = new AgentIO({});
  assert.equal(await io.choose('Ghost', { ...req, options: ['Bob'] }), 'Bob');
});

test('statement: trims, truncates to maxLength and keeps thinking private', async () => {
  const io = new AgentIO({ Ann: new ScriptedAgent([], [{ thinking: ' hmm ', statement: '  Hello everyone  ' }]) });
  const out = await io.statement('Ann', { kind: 'discussion', prompt: '', context: '', maxLength: 5 });
  assert.deepEqual(out, { thinking: 'hmm', statement: 'Hello' });
});

test('statement: failure yields a neutral silent statement', async () => {
  const io = new AgentIO({ Ann: new ScriptedAgent([], [new Error('x')]) }, { maxAttempts: 1 });
  const out = await io.statement('Ann', { kind: 'discussion', prompt: '', context: '', maxLength: 500 });
  assert.deepEqual(out, { thinking: '', statement: 'Ann remains silent.' });
});
