import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { isYes, ReadlineInputProvider } from '../../src/cli/prompts.js';
import { ValidationError } from '../../src/errors/index.js';

function provider() {
  const input = new PassThrough();
  const output = new PassThrough();
  return { input, prompts: new ReadlineInputProvider(input, output) };
}

describe('prompts', () => {
  describe('isYes', () => {
    it('should only accept an explicit yes', () => {
      expect(isYes('yes')).toBe(true);
      expect(isYes('  YES ')).toBe(true);
      expect(isYes('y')).toBe(false);
      expect(isYes('no')).toBe(false);
      expect(isYes('')).toBe(false);
    });
  });

  describe('ReadlineInputProvider', () => {
    it('should read trimmed answers', async () => {
      const { input, prompts } = provider();

      const refTime = prompts.getReferenceTime();
      input.write(' 15.5 \n');
      await expect(refTime).resolves.toBe('15.5');

      const confirmed = prompts.confirm('Apply?');
      input.write('yes\n');
      await expect(confirmed).resolves.toBe(true);

      prompts.close();
    });

    it('should decline a pending confirmation when input ends', async () => {
      const { input, prompts } = provider();

      const confirmed = prompts.confirm('Apply?');
      input.end();

      await expect(confirmed).resolves.toBe(false);
      await expect(prompts.confirm('Revert?')).resolves.toBe(false);
    });

    it('should reject a required answer once input has ended', async () => {
      const { input, prompts } = provider();

      const refTime = prompts.getReferenceTime();
      input.end();

      await expect(refTime).rejects.toThrow(ValidationError);
      await expect(prompts.getRange()).rejects.toThrow('Input ended before from_cp_id was entered');
    });
  });
});
