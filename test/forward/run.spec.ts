import { describe, it, expect } from 'vitest';
import { USAGE, run, runArgs } from '../../src/forward/Run.js';
import { DEFAULT_OPTIONS } from '../../src/forward/Options.js';

describe('Command execution', () => {
  it('should print the selected example', () => {
    const result = runArgs(['f1']);
    expect(result.exitCode).toBe(0);
    expect(result.stderr).toBe('');
    expect(result.stdout.split('\n')).toEqual([
      'f1(x) = x*x',
      'f1(3)  = 9',
      "f1'(3) = 6",
      'f1(5)  = 25',
      "f1'(5) = 10",
      '--------------------'
    ]);
  });

  it('should run every example when none is named', () => {
    const stdout = runArgs([]).stdout;
    const headers = stdout.split('\n').filter(line => line.includes('(x) = '));
    expect(headers).toEqual([
      'f1(x) = x*x',
      'f2(x) = sin(x)',
      'f3(x) = 3*cos(x) - x',
      'f4(x) = x*x + 2*x + 1'
    ]);
  });

  it('should evaluate at given points with closed forms', () => {
    const result = run({
      ...DEFAULT_OPTIONS,
      examples: ['f4'],
      points: [1],
      showExpected: true
    });
    expect(result.stdout.split('\n')).toEqual([
      'f4(x) = x*x + 2*x + 1',
      'f4(1)  = 4',
      "f4'(1) = 4  (expected 4)",
      '--------------------'
    ]);
  });

  it('should list examples and functions', () => {
    const result = runArgs(['--list']);
    expect(result.exitCode).toBe(0);
    expect(result.stdout.split('\n')[0]).toBe('Examples:');
  });

  describe('--check', () => {
    it('should exit 0 when every derivative agrees', () => {
      const result = runArgs(['--check']);
      expect(result.exitCode).toBe(0);
      expect(result.stdout.split('\n')).toHaveLength(4);
    });

    it('should exit 1 when a derivative disagrees', () => {
      // A coarse step makes the difference quotient of sin miss at 0
      const result = runArgs(['f2', '--check', '--epsilon', '0.5']);
      const lines = result.stdout.split('\n');

      expect(result.exitCode).toBe(1);
      expect(lines[0]).toBe('✗ f2: 1/2 derivatives FAILED');
      expect(lines[1]).toContain('x=0: analytical=1.000000, numerical=0.958851');
    });

    it('should honour --format json', () => {
      const result = runArgs(['f1', '--check', '--format', 'json']);
      const parsed: unknown = JSON.parse(result.stdout);
      expect(parsed).toMatchObject({ passed: true, results: [{ name: 'f1' }] });
    });
  });

  describe('Errors and help', () => {
    it('should print usage for --help', () => {
      expect(runArgs(['--help'])).toEqual({ exitCode: 0, stdout: USAGE, stderr: '' });
    });

    it('should print usage after an argument error', () => {
      const result = runArgs(['--nope']);
      expect(result.exitCode).toBe(1);
      expect(result.stdout).toBe('');
      expect(result.stderr).toBe(`Error: Unknown option "--nope"\n\n${USAGE}`);
    });

    it('should add the stack trace with --verbose', () => {
      const result = runArgs(['f9', '--verbose']);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain('Error: Unknown example "f9"');
      expect(result.stderr).toContain('\n\nStack trace:\n');
    });

    it('should report unknown examples without usage', () => {
      expect(runArgs(['f9'])).toEqual({
        exitCode: 1,
        stdout: '',
        stderr: 'Error: Unknown example "f9". Available: f1, f2, f3, f4'
      });
    });
  });
});
