import { describe, expect, it } from 'vitest';
import { applyOpts, type Opt, type OptTarget, optHeader, optQuery } from './opt.js';

function freshTarget(): OptTarget {
  return { headers: new Headers(), searchParams: new URLSearchParams() };
}

describe('applyOpts', () => {
  it('applies options in listed order', () => {
    const calls: string[] = [];
    const first: Opt = () => calls.push('first');
    const second: Opt = () => calls.push('second');

    applyOpts(freshTarget(), [first, second]);

    expect(calls).toEqual(['first', 'second']);
  });

  it('matches applying each option by hand', () => {
    const a = optHeader('X-Order', 'a');
    const b = optHeader('X-Order', 'b');
    const q = optQuery('limit', 2);

    const combined = applyOpts(freshTarget(), [a, q, b]);
    const manual = freshTarget();
    a(manual);
    q(manual);
    b(manual);

    expect([...combined.headers.entries()]).toEqual([...manual.headers.entries()]);
    expect(combined.searchParams.toString()).toBe(manual.searchParams.toString());
    expect(combined.headers.get('x-order')).toBe('b');
  });

  it('returns the target it was given', () => {
    const target = freshTarget();
    expect(applyOpts(target, [])).toBe(target);
  });
});

describe('optQuery', () => {
  it('replaces earlier values', () => {
    const target = applyOpts(freshTarget(), [optQuery('limit', 2), optQuery('limit', 3)]);
    expect(target.searchParams.toString()).toBe('limit=3');
  });
});
