import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createRng,
  runAutomaticPass,
  runPlayerPass,
  type OutputEvent,
  type Rng,
} from '../../src/kernel/index.js';
import { buildHarness, type ActionSpec } from '../helpers/world-builder.js';

const SAY = 5;
const WAIT = 4;
const BIT = 8;

const texts = (events: readonly OutputEvent[]): string[] =>
  events.flatMap((event) => (event.kind === 'text' ? [event.text] : []));

const setup = (actions: readonly ActionSpec[]) => {
  const harness = buildHarness({ actions });
  return { ...harness, ctx: { runtime: harness.runtime, collector: harness.collector, nounText: '' } };
};

describe('runPlayerPass', () => {
  it('runs the first matching action whose conditions hold', () => {
    const { ctx, state } = setup([
      { verb: SAY, conditions: [[BIT, 3]], commands: [1] },
      { verb: SAY, commands: [2] },
      { verb: SAY, commands: [3] },
    ]);
    const result = runPlayerPass(ctx, state, SAY, 0);

    assert.equal(result.outcome, 'executed');
    assert.deepEqual(texts(result.events), ['two']);
  });

  it('lets a table noun of 0 match any noun', () => {
    const { ctx, state } = setup([
      { verb: SAY, noun: 8, commands: [1] },
      { verb: SAY, commands: [2] },
    ]);

    assert.deepEqual(texts(runPlayerPass(ctx, state, SAY, 8).events), ['one']);
    assert.deepEqual(texts(runPlayerPass(ctx, state, SAY, 9).events), ['two']);
  });

  it('tells failed conditions apart from no match', () => {
    const { ctx, state } = setup([{ verb: SAY, conditions: [[BIT, 3]], commands: [1] }]);

    const failed = runPlayerPass(ctx, state, SAY, 0);
    assert.equal(failed.outcome, 'conditionsFailed');
    assert.deepEqual(failed.events, []);
    assert.equal(runPlayerPass(ctx, state, WAIT, 0).outcome, 'noMatch');
  });

  it('follows CONT past failing continuation actions', () => {
    const { ctx, state } = setup([
      { verb: SAY, commands: [1, 73] },
      { conditions: [[BIT, 3]], commands: [2] },
      { commands: [3] },
      { commands: [4] },
    ]);
    const result = runPlayerPass(ctx, state, SAY, 0);

    assert.deepEqual(texts(result.events), ['one', 'three']);
    assert.equal(result.state.continuation, false);
  });

  it('keeps chaining while continuation actions raise CONT again', () => {
    const { ctx, state } = setup([
      { verb: SAY, commands: [1, 73] },
      { commands: [2, 73] },
      { commands: [3] },
    ]);

    assert.deepEqual(texts(runPlayerPass(ctx, state, SAY, 0).events), ['one', 'two', 'three']);
  });

  it('ends the chain at the first action with a verb', () => {
    const { ctx, state } = setup([
      { verb: SAY, commands: [1, 73] },
      { verb: WAIT, commands: [2] },
      { commands: [3] },
    ]);

    assert.deepEqual(texts(runPlayerPass(ctx, state, SAY, 0).events), ['one']);
  });

  it('traces executed actions with their titles', () => {
    const { ctx, state, collector } = setup([{ verb: SAY, commands: [1] }]);
    runPlayerPass(ctx, state, SAY, 0);

    assert.deepEqual(collector.trace, [{ kind: 'action', phase: 'scanningPlayerVerb', index: 0, title: 'action 0' }]);
  });
});

describe('runAutomaticPass', () => {
  it('runs a noun 0 automatic action without rolling', () => {
    const { ctx, state } = setup([{ commands: [1] }]);
    const rng = createRng(7n);
    const result = runAutomaticPass(ctx, state, rng);

    assert.deepEqual(texts(result.events), ['one']);
    assert.deepEqual(result.rng, rng);
  });

  it('always fires a 100 percent action and consumes one roll', () => {
    const { ctx, state } = setup([{ noun: 100, commands: [1] }]);
    const rng = createRng(7n);
    const result = runAutomaticPass(ctx, state, rng);

    assert.deepEqual(texts(result.events), ['one']);
    assert.notDeepEqual(result.rng, rng);
  });

  it('only looks at verb 0 actions, in table order', () => {
    const { ctx, state } = setup([
      { noun: 100, commands: [1] },
      { verb: SAY, commands: [2] },
      { noun: 100, commands: [3] },
    ]);

    assert.deepEqual(texts(runAutomaticPass(ctx, state, createRng(1n)).events), ['one', 'three']);
  });

  it('resumes the scan after a continuation chain without repeating it', () => {
    const { ctx, state } = setup([
      { noun: 100, commands: [1, 73] },
      { commands: [2] },
      { noun: 100, commands: [3] },
    ]);

    assert.deepEqual(texts(runAutomaticPass(ctx, state, createRng(1n)).events), ['one', 'two', 'three']);
  });

  it('stops on a halt', () => {
    const { ctx, state } = setup([
      { noun: 100, commands: [63] },
      { noun: 100, commands: [1] },
    ]);
    const result = runAutomaticPass(ctx, state, createRng(1n));

    assert.equal(result.halt, 'fini');
    assert.deepEqual(texts(result.events), ['The game is now over.']);
  });

  it('fires a 50 percent action about half of the time', () => {
    const { ctx, state } = setup([{ noun: 50, commands: [1] }]);
    let rng: Rng = createRng(20240601n);
    let fired = 0;

    for (let trial = 0; trial < 10_000; trial += 1) {
      const result = runAutomaticPass(ctx, state, rng);
      rng = result.rng;
      fired += result.events.length;
    }

    assert.ok(fired >= 4_700 && fired <= 5_300, `fired ${fired} times`);
  });

  it('traces each roll', () => {
    const { ctx, state, collector } = setup([{ noun: 100, commands: [1] }]);
    runAutomaticPass(ctx, state, createRng(3n));

    const [roll, action] = collector.trace ?? [];
    assert.equal(roll?.kind, 'autoRoll');
    assert.deepEqual(action, { kind: 'action', phase: 'scanningAutomatic', index: 0, title: 'action 0' });
  });
});
