/**
 * Unit tests for command-line parsing
 */
import { describe, it, expect } from 'vitest';
import { DEFAULT_OUTPUT, parseArgs } from '../../../cli/args';

describe('parseArgs()', () => {
  it('should use defaults without flags', () => {
    expect(parseArgs(['spells'])).toEqual({
      inputs: ['spells'],
      title: '',
      out: DEFAULT_OUTPUT,
      help: false
    });
  });

  it('should read value flags and collect inputs in order', () => {
    const options = parseArgs([
      'a.json',
      '--title',
      'My Book',
      'spells/*.json',
      '--config',
      'layout.json',
      '--background',
      'parchment.png',
      '--out',
      'book.pdf'
    ]);

    expect(options).toEqual({
      inputs: ['a.json', 'spells/*.json'],
      title: 'My Book',
      config: 'layout.json',
      background: 'parchment.png',
      out: 'book.pdf',
      help: false
    });
  });

  it('should recognise help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('should reject unknown flags', () => {
    expect(() => parseArgs(['--colour', 'red'])).toThrow('Unknown option --colour');
  });

  it('should reject a flag without its value', () => {
    expect(() => parseArgs(['--out'])).toThrow('Option --out needs a value');
    expect(() => parseArgs(['--title', '--out', 'x.pdf'])).toThrow('Option --title needs a value');
  });
});
