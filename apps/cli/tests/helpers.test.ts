import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { CommanderError } from 'commander';
import { TaskStatus, ValidationError, NotFoundError } from '@task-tracker/core';
import { parseStatus, requireStatus, parseTaskId, $try } from '../src/helpers.js';

describe('parseStatus', () => {
  it('parses "todo"', () => {
    expect(parseStatus('todo')).toBe(TaskStatus.Todo);
  });

  it('parses "pending" as todo', () => {
    expect(parseStatus('pending')).toBe(TaskStatus.Todo);
  });

  it('parses "in-progress"', () => {
    expect(parseStatus('in-progress')).toBe(TaskStatus.InProgress);
  });

  it('parses "inprogress"', () => {
    expect(parseStatus('inprogress')).toBe(TaskStatus.InProgress);
  });

  it('parses "wip"', () => {
    expect(parseStatus('wip')).toBe(TaskStatus.InProgress);
  });

  it('parses "done"', () => {
    expect(parseStatus('done')).toBe(TaskStatus.Done);
  });

  it('parses "completed"', () => {
    expect(parseStatus('completed')).toBe(TaskStatus.Done);
  });

  it('is case-insensitive', () => {
    expect(parseStatus('DONE')).toBe(TaskStatus.Done);
    expect(parseStatus('In-Progress')).toBe(TaskStatus.InProgress);
  });

  it('returns null for unknown', () => {
    expect(parseStatus('blocked')).toBeNull();
  });
});

describe('requireStatus', () => {
  it('returns the parsed status', () => {
    expect(requireStatus('todo')).toBe(TaskStatus.Todo);
  });

  it('throws ValidationError for unknown', () => {
    expect(() => requireStatus('later')).toThrow(ValidationError);
    expect(() => requireStatus('later')).toThrow("Unknown status: 'later'. Use: todo, in-progress, done");
  });
});

describe('parseTaskId', () => {
  it('parses positive integers', () => {
    expect(parseTaskId('1')).toBe(1);
    expect(parseTaskId(' 42 ')).toBe(42);
  });

  it.each(['0', '-1', '1.5', 'abc', '', '1e3', '99999999999999999999'])('rejects %j', raw => {
    expect(() => parseTaskId(raw)).toThrow(ValidationError);
  });

  it('names the bad input', () => {
    expect(() => parseTaskId('x1')).toThrow("Invalid task id: 'x1'");
  });
});

describe('$try', () => {
  let errors: string[];

  beforeEach(() => {
    chalk.level = 0;
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns 0 on success', () => {
    const fn = vi.fn();
    expect($try(fn)).toBe(0);
    expect(fn).toHaveBeenCalledOnce();
    expect(errors).toEqual([]);
  });

  it('reports store errors and returns 1', () => {
    expect($try(() => { throw new NotFoundError(3); })).toBe(1);
    expect(errors).toEqual(['Task 3 not found']);
  });

  it('reports unexpected errors and returns 1', () => {
    expect($try(() => { throw new Error('disk full'); })).toBe(1);
    expect(errors).toEqual(['disk full']);
  });

  it('reports non-Error throws', () => {
    expect($try(() => { throw 'odd'; })).toBe(1);
    expect(errors).toEqual(['odd']);
  });

  it('passes commander exit codes through without printing', () => {
    expect($try(() => { throw new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'); })).toBe(0);
    expect($try(() => { throw new CommanderError(1, 'commander.missingArgument', 'missing'); })).toBe(1);
    expect(errors).toEqual([]);
  });
});
