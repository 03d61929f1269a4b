/**
 * Unit Tests for LinkedIn Delivery Service
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { CredentialCache, MemoryCredentialStore } from '../../src/credential-cache/index.js';
import {
  DEFAULT_CONNECTION_NOTE,
  LINKEDIN_ACTIONS,
  LinkedInService,
  parseProfiles,
} from '../../src/linkedin/index.js';
import { FakeConnector } from '../helpers.js';

describe('parseProfiles', () => {
  it('reads a bare array', () => {
    expect(parseProfiles([{ id: 'p1', name: 'Riley Chen', headline: 'Platform Engineer', profileUrl: 'https://www.linkedin.com/in/riley' }])).toEqual([
      { id: 'p1', name: 'Riley Chen', headline: 'Platform Engineer', url: 'https://www.linkedin.com/in/riley' },
    ]);
  });

  it('reads nested collections and split names', () => {
    expect(
      parseProfiles({ elements: [{ urn: 'urn:li:person:2', firstName: 'Dana', lastName: 'Ortiz', url: 'https://www.linkedin.com/in/dana' }] })
    ).toEqual([{ id: 'urn:li:person:2', name: 'Dana Ortiz', headline: undefined, url: 'https://www.linkedin.com/in/dana' }]);
  });

  it('skips entries without an id', () => {
    expect(parseProfiles({ profiles: [{ name: 'Nobody' }, 'noise', { id: 7, fullName: 'Sam Lee' }] })).toEqual([
      { id: '7', name: 'Sam Lee', headline: undefined, url: undefined },
    ]);
  });

  it('returns nothing for unknown shapes', () => {
    expect(parseProfiles({ ok: true })).toEqual([]);
    expect(parseProfiles(null)).toEqual([]);
  });
});

describe('LinkedInService', () => {
  let connector: FakeConnector;
  let store: MemoryCredentialStore;
  let service: LinkedInService;

  beforeEach(() => {
    connector = new FakeConnector();
    store = new MemoryCredentialStore();
    service = new LinkedInService(connector, { credentials: new CredentialCache({ kind: 'access token', store }) });
  });

  it('links the account through the connector platform', async () => {
    const result = await service.setup('user-1');
    expect(result.success && result.redirectUrl).toBe('https://connect.example.com/auth/ca_test');
    expect(connector.initiated[0]).toEqual({ toolkit: 'linkedin', entityId: 'user-1', params: undefined });
  });

  describe('searchProfiles', () => {
    it('returns parsed profiles', async () => {
      connector.actionResults.set(LINKEDIN_ACTIONS.search[0], {
        successful: true,
        data: { profiles: [{ id: 'p1', name: 'Riley Chen' }, { id: 'p2', name: 'Dana Ortiz' }] },
      });

      const result = await service.searchProfiles({ keywords: 'platform engineer', accessToken: 'test-secret' });

      expect(result).toEqual({
        success: true,
        message: 'Found 2 profiles matching your search',
        profiles: [
          { id: 'p1', name: 'Riley Chen', headline: undefined, url: undefined },
          { id: 'p2', name: 'Dana Ortiz', headline: undefined, url: undefined },
        ],
      });
      expect(connector.executed[0]?.args).toEqual({ keywords: 'platform engineer', limit: 10, token: 'test-secret' });
    });

    it('falls back to the next action name', async () => {
      connector.actionResults.set(LINKEDIN_ACTIONS.search[0], new Error('Action not found'));
      connector.actionResults.set(LINKEDIN_ACTIONS.search[1], { successful: true, data: [{ id: 'p1', name: 'Riley Chen' }] });

      const result = await service.searchProfiles({ keywords: 'sre', limit: 5, accessToken: 'test-secret' });

      expect(result.success && result.profiles).toHaveLength(1);
      expect(connector.executed.map((call) => call.action)).toEqual([
        'LINKEDIN_SEARCH_FOR_PEOPLE',
        'LINKEDIN_SEARCHES_FOR_PEOPLE',
      ]);
    });

    it('reports a rejected search', async () => {
      connector.actionResults.set(LINKEDIN_ACTIONS.search[0], { successful: false, error: 'Insufficient scope' });

      expect(await service.searchProfiles({ keywords: 'sre', accessToken: 'test-secret' })).toEqual({
        success: false,
        error: 'Failed to search LinkedIn profiles: Insufficient scope',
      });
    });

    it('reports when every action name fails', async () => {
      for (const action of LINKEDIN_ACTIONS.search) {
        connector.actionResults.set(action, new Error('gone'));
      }

      expect(await service.searchProfiles({ keywords: 'sre', accessToken: 'test-secret' })).toEqual({
        success: false,
        error:
          'Error searching LinkedIn profiles: All candidate actions failed: LINKEDIN_SEARCH_FOR_PEOPLE (gone); LINKEDIN_SEARCHES_FOR_PEOPLE (gone); LINKEDIN_SEARCHES_PROFILES (gone)',
      });
    });
  });

  describe('access tokens', () => {
    it('rejects calls without a supplied or cached token', async () => {
      expect(await service.sendMessage({ profileId: 'p1', message: 'hi', accessToken: 'string' })).toEqual({
        success: false,
        error: 'Invalid access token provided',
      });
      expect(connector.executed).toHaveLength(0);
    });

    it('reuses a token cached for the same entity', async () => {
      await service.searchProfiles({ keywords: 'sre', accessToken: 'test-secret', entityId: 'user-1' });

      const result = await service.sendMessage({ profileId: 'p1', message: 'hi', entityId: 'user-1' });

      expect(result).toEqual({ success: true, message: 'Message sent successfully' });
      expect(connector.executed[1]?.args).toEqual({ profileId: 'p1', message: 'hi', token: 'test-secret' });
    });

    it('keeps tokens separate per entity', async () => {
      await service.searchProfiles({ keywords: 'sre', accessToken: 'test-secret', entityId: 'user-1' });

      expect((await service.sendMessage({ profileId: 'p1', message: 'hi', entityId: 'user-2' })).success).toBe(false);
    });
  });

  describe('sendConnectionRequest', () => {
    it('uses the default note when none is given', async () => {
      const result = await service.sendConnectionRequest({
        profileUrl: 'https://www.linkedin.com/in/riley',
        accessToken: 'test-secret',
      });

      expect(result).toEqual({
        success: true,
        message: 'Connection request sent successfully',
        note: DEFAULT_CONNECTION_NOTE,
      });
      expect(connector.executed[0]).toEqual({
        action: 'LINKEDIN_SENDS_CONNECTION_REQUEST',
        args: { profileUrl: 'https://www.linkedin.com/in/riley', message: DEFAULT_CONNECTION_NOTE, token: 'test-secret' },
        options: { entityId: 'default' },
      });
    });

    it('sends a supplied note', async () => {
      const result = await service.sendConnectionRequest({
        profileUrl: 'https://www.linkedin.com/in/riley',
        message: 'Enjoyed your talk on observability',
        accessToken: 'test-secret',
      });
      expect(result.success && result.note).toBe('Enjoyed your talk on observability');
    });
  });

  describe('createPost', () => {
    it('returns the post id and passes optional links', async () => {
      connector.actionResults.set(LINKEDIN_ACTIONS.post[0], { successful: true, data: { id: 'urn:li:share:99' } });

      const result = await service.createPost({
        content: 'We are hiring platform engineers',
        articleUrl: 'https://example.com/jobs',
        accessToken: 'test-secret',
      });

      expect(result).toEqual({ success: true, message: 'Post created successfully', postId: 'urn:li:share:99' });
      expect(connector.executed[0]?.args).toEqual({
        content: 'We are hiring platform engineers',
        token: 'test-secret',
        articleUrl: 'https://example.com/jobs',
      });
    });

    it('reports a rejected post', async () => {
      connector.actionResults.set(LINKEDIN_ACTIONS.post[0], { successful: false, error: 'Duplicate post' });
      expect(await service.createPost({ content: 'Hello', accessToken: 'test-secret' })).toEqual({
        success: false,
        error: 'Failed to create post: Duplicate post',
      });
    });
  });

  describe('listActions', () => {
    it('keeps LinkedIn actions and fills missing descriptions', async () => {
      connector.actions = [
        { name: 'LINKEDIN_CREATE_POST', description: 'Create a post' },
        { name: 'linkedin_get_profile' },
        { name: 'GMAIL_SEND_EMAIL', description: 'Send mail' },
      ];

      expect(await service.listActions()).toEqual({
        success: true,
        message: 'Found 2 LinkedIn actions',
        actions: [
          { name: 'LINKEDIN_CREATE_POST', description: 'Create a post' },
          { name: 'linkedin_get_profile', description: 'No description available' },
        ],
      });
    });

    it('reports listing failures', async () => {
      connector.listError = new Error('Unauthorized');
      expect(await service.listActions()).toEqual({
        success: false,
        error: 'Error listing LinkedIn actions: Unauthorized',
      });
    });
  });
});
