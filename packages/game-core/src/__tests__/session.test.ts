// packages/game-core/src/__tests__/session.test.ts
//
// Unit tests for GuessingSession: guess counting, state transitions and the
// terminal won state.

import {
  GuessingSession,
  SessionFinishedError,
  type RandomSource,
  type StepOutcome,
} from '../index.js';

/** A random source that makes drawSecret(…, 1, 100) return `secret`. */
function fixedSecret(secret: number): RandomSource {
  return () => (secret - 1 + 0.5) / 100;
}

function results(steps: StepOutcome[]) {
  return steps.map((s) =>
    s.kind === 'invalid' ? ['invalid', s.guesses] : [s.result, s.guesses],
  );
}

describe('GuessingSession', () => {
  it('draws the secret once from the injected random source', () => {
    const random = vi.fn(fixedSecret(68));
    const session = new GuessingSession(random);
    expect(session.secret).toBe(68);
    session.submit('10');
    session.submit('20');
    expect(session.secret).toBe(68);
    expect(random).toHaveBeenCalledTimes(1);
  });

  it('starts in prompting with no guesses', () => {
    const session = new GuessingSession(fixedSecret(5));
    expect(session.state).toBe('prompting');
    expect(session.guesses).toBe(0);
    expect(session.won).toBe(false);
  });

  it('plays the 50, 75, 62, 68 sequence against secret 68', () => {
    const session = new GuessingSession(fixedSecret(68));
    const steps = ['50', '75', '62', '68'].map((line) => session.submit(line));
    expect(results(steps)).toEqual([
      ['too-small', 1],
      ['too-big', 2],
      ['too-small', 3],
      ['correct', 4],
    ]);
    expect(session.won).toBe(true);
    expect(session.guesses).toBe(4);
  });

  it('does not count unparsable input', () => {
    const session = new GuessingSession(fixedSecret(30));
    const steps = ['abc', '10', '', '30'].map((line) => session.submit(line));
    expect(results(steps)).toEqual([
      ['invalid', 0],
      ['too-small', 1],
      ['invalid', 1],
      ['correct', 2],
    ]);
    expect(session.guesses).toBe(2);
  });

  it('returns to prompting after a parse failure', () => {
    const session = new GuessingSession(fixedSecret(30));
    session.markPrompted();
    expect(session.state).toBe('awaiting-input');
    const step = session.submit('abc');
    expect(step.kind).toBe('invalid');
    expect(session.state).toBe('prompting');
  });

  it('wins on the first guess at the range minimum', () => {
    const session = new GuessingSession(fixedSecret(1));
    expect(session.submit('1')).toEqual({
      kind: 'feedback',
      guess: 1,
      result: 'correct',
      guesses: 1,
    });
  });

  it('wins on the first guess at the range maximum', () => {
    const session = new GuessingSession(fixedSecret(100));
    const step = session.submit('100');
    expect(step.kind === 'feedback' && step.result).toBe('correct');
    expect(session.state).toBe('won');
  });

  it('counts out-of-range guesses as valid', () => {
    const session = new GuessingSession(fixedSecret(50));
    expect(results([session.submit('-3'), session.submit('500')])).toEqual([
      ['too-small', 1],
      ['too-big', 2],
    ]);
  });

  it('rejects input once the session is won', () => {
    const session = new GuessingSession(fixedSecret(7));
    session.submit('7');
    expect(() => session.submit('7')).toThrow(SessionFinishedError);
    expect(() => session.markPrompted()).toThrow('Session already won in 1 guesses');
    expect(session.guesses).toBe(1);
  });
});
