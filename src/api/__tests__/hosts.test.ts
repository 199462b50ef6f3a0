import { describe, expect, it } from 'vitest';
import { isHostAllowed } from '../hooks/hosts';

describe('isHostAllowed', () => {
  it('allows anything with a lone wildcard', () => {
    expect(isHostAllowed('whatever.test', ['*'])).toBe(true);
  });

  it('matches exact hosts case-insensitively', () => {
    expect(isHostAllowed('API.Example.test', ['api.example.test'])).toBe(true);
    expect(isHostAllowed('evil.test', ['api.example.test'])).toBe(false);
  });

  it('matches subdomain patterns but not the bare parent', () => {
    expect(isHostAllowed('eu.api.example.test', ['*.example.test'])).toBe(true);
    expect(isHostAllowed('example.test', ['*.example.test'])).toBe(false);
    expect(isHostAllowed('badexample.test', ['*.example.test'])).toBe(false);
  });
});
