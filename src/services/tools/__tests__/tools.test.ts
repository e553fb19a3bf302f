import { describe, it, expect } from 'vitest';
import { TOOL_TABLE, NO_USERNAME_ERROR, isToolName } from '../index.js';
import { TWO_SUM, createFakeClient, profileOf } from '../../__tests__/fakes.js';

describe('LeetCode tools', () => {
  describe('problem', () => {
    it('should look up the problem by slug', async () => {
      const client = createFakeClient();

      const outcome = await TOOL_TABLE.problem.run({ title_slug: 'two-sum' }, { client });

      expect(outcome).toEqual({ ok: true, data: TWO_SUM });
      expect(client.problem).toHaveBeenCalledWith('two-sum');
    });

    it('should pass data client failures through as errors', async () => {
      const client = createFakeClient();

      const outcome = await TOOL_TABLE.problem.run({ title_slug: 'no-such-problem' }, { client });

      expect(outcome).toEqual({ ok: false, error: 'Problem "no-such-problem" not found' });
    });

    it('should reject a missing slug without calling the client', async () => {
      const client = createFakeClient();

      const outcome = await TOOL_TABLE.problem.run({}, { client });

      expect(outcome).toEqual({ ok: false, error: 'invalid arguments: title_slug: Required' });
      expect(client.problem).not.toHaveBeenCalled();
    });
  });

  describe('search_problems', () => {
    it('should apply declared defaults', async () => {
      const client = createFakeClient();

      await TOOL_TABLE.search_problems.run({}, { client });

      expect(client.search).toHaveBeenCalledWith('', undefined, 5);
    });

    it('should normalize difficulty casing', async () => {
      const client = createFakeClient();

      await TOOL_TABLE.search_problems.run({ keywords: ' array ', difficulty: 'Medium', limit: 3 }, { client });

      expect(client.search).toHaveBeenCalledWith('array', 'MEDIUM', 3);
    });

    it('should treat an empty difficulty as any', async () => {
      const client = createFakeClient();

      await TOOL_TABLE.search_problems.run({ difficulty: '' }, { client });

      expect(client.search).toHaveBeenCalledWith('', undefined, 5);
    });

    it('should reject an unknown difficulty', async () => {
      const client = createFakeClient();

      const outcome = await TOOL_TABLE.search_problems.run({ difficulty: 'trivial' }, { client });

      expect(outcome.ok).toBe(false);
      expect(client.search).not.toHaveBeenCalled();
    });
  });

  describe('daily_challenge', () => {
    it('should ignore extra arguments', async () => {
      const client = createFakeClient();

      const outcome = await TOOL_TABLE.daily_challenge.run({ unexpected: true }, { client });

      expect(outcome.ok).toBe(true);
      expect(client.dailyChallenge).toHaveBeenCalledTimes(1);
    });
  });

  describe('username tools', () => {
    it('should prefer the explicit username', async () => {
      const client = createFakeClient();

      const outcome = await TOOL_TABLE.user_profile.run({ username: 'alice' }, { client, defaultUsername: 'bob' });

      expect(outcome).toEqual({ ok: true, data: profileOf('alice') });
      expect(client.userProfile).toHaveBeenCalledWith('alice');
    });

    it('should fall back to the configured default identity', async () => {
      const client = createFakeClient();

      await TOOL_TABLE.recent_submissions.run({}, { client, defaultUsername: 'bob' });

      expect(client.recentSubmissions).toHaveBeenCalledWith('bob', 10);
    });

    it('should fail without calling the client when no username is available', async () => {
      const client = createFakeClient();

      const profile = await TOOL_TABLE.user_profile.run({}, { client });
      const submissions = await TOOL_TABLE.recent_submissions.run({ username: '' }, { client });

      expect(profile).toEqual({ ok: false, error: NO_USERNAME_ERROR });
      expect(submissions).toEqual({ ok: false, error: NO_USERNAME_ERROR });
      expect(client.userProfile).not.toHaveBeenCalled();
      expect(client.recentSubmissions).not.toHaveBeenCalled();
    });
  });

  it('should recognize only declared tool names', () => {
    expect(isToolName('problem')).toBe(true);
    expect(isToolName('calculator')).toBe(false);
  });
});
