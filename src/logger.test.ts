import test from 'node:test';
import assert from 'node:assert/strict';
import { highlightRoles } from './logger.js';

const tag = (role: string, text: string) => `<${role}:${text}>`;

test('highlightRoles: marks every role word, plurals and mixed case included', () => {
  assert.equal(
    highlightRoles('The Assassins fear the Doctor and the zombie.', tag),
    'The <assassin:Assassins> fear the <doctor:Doctor> and the <zombie:zombie>.'
  );
});

test('highlightRoles: the Mad Scientist is matched in display and key form', () => {
  assert.equal(
    highlightRoles('Sci was a Mad Scientist; mad_scientists lie.', tag),
    'Sci was a <mad_scientist:Mad Scientist>; <mad_scientist:mad_scientists> lie.'
  );
});

test('highlightRoles: words that only contain a role are left alone', () => {
  assert.equal(highlightRoles('doctorate villagers', tag), 'doctorate <villager:villagers>');
});
