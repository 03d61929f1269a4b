/**
 * LinkedIn Delivery Service
 *
 * Profile search, connection requests, direct messages and posts through the
 * connector platform. The platform has renamed these actions more than once,
 * so each operation carries an ordered list of candidate action names that
 * executeWithFallback walks until one is accepted.
 *
 * Access tokens are remembered per entity for 24 hours.
 */

import type { ConnectorClient } from '../connector/index.js';
import { executeWithFallback, normalizeActionResponse, setupConnection } from '../connector/index.js';
import { CredentialCache } from '../credential-cache/index.js';
import type { Logger } from '../logger/index.js';
import { silentLogger } from '../logger/index.js';
import type { EntityId, ServiceResult, SetupResult } from '../types/index.js';
import { CHANNEL_LABELS, DEFAULT_ENTITY_ID, errorMessage, failure } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface LinkedInProfile {
  id: string;
  name: string;
  headline?: string | undefined;
  url?: string | undefined;
}

export interface LinkedInAction {
  name: string;
  description: string;
}

interface Authenticated {
  accessToken?: string | undefined;
  entityId?: EntityId | undefined;
}

export interface ProfileSearch extends Authenticated {
  keywords: string;
  limit?: number | undefined;
}

export interface ConnectionRequest extends Authenticated {
  profileUrl: string;
  message?: string | undefined;
}

export interface DirectMessage extends Authenticated {
  profileId: string;
  message: string;
}

export interface PostRequest extends Authenticated {
  content: string;
  imageUrl?: string | undefined;
  articleUrl?: string | undefined;
}

export interface LinkedInServiceOptions {
  credentials?: CredentialCache;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

/** Candidate action names, most recent first */
export const LINKEDIN_ACTIONS = {
  search: ['LINKEDIN_SEARCH_FOR_PEOPLE', 'LINKEDIN_SEARCHES_FOR_PEOPLE', 'LINKEDIN_SEARCHES_PROFILES'],
  connect: ['LINKEDIN_SENDS_CONNECTION_REQUEST', 'LINKEDIN_SENDS_A_CONNECTION_REQUEST', 'LINKEDIN_CONNECT_WITH_PROFILE'],
  message: ['LINKEDIN_SENDS_MESSAGE', 'LINKEDIN_SENDS_A_MESSAGE', 'LINKEDIN_MESSAGE_PROFILE'],
  post: ['LINKEDIN_CREATES_POST', 'LINKEDIN_CREATES_A_POST', 'LINKEDIN_SHARE_POST'],
} as const;

export const DEFAULT_CONNECTION_NOTE = "I'd like to connect with you on LinkedIn.";
export const DEFAULT_SEARCH_LIMIT = 10;

const INVALID_TOKEN = 'Invalid access token provided';

// ============================================================================
// Response parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

function profileName(item: Record<string, unknown>): string {
  const direct = text(item.name) ?? text(item.fullName);
  if (direct) return direct;

  const first = text(item.firstName) ?? text(item.localizedFirstName);
  const last = text(item.lastName) ?? text(item.localizedLastName);
  return [first, last].filter((part): part is string => part !== undefined).join(' ');
}

/**
 * Extract profiles from a search payload: either an array or an object with
 * `profiles`, `elements` or `results`
 */
export function parseProfiles(data: unknown): LinkedInProfile[] {
  let items: unknown[] = [];
  if (Array.isArray(data)) {
    items = data;
  } else if (isRecord(data)) {
    const nested = [data.profiles, data.elements, data.results].find((value) => Array.isArray(value));
    items = Array.isArray(nested) ? nested : [];
  }

  const profiles: LinkedInProfile[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const id = text(item.id) ?? text(item.urn);
    if (!id) continue;

    profiles.push({
      id,
      name: profileName(item),
      headline: text(item.headline),
      url: text(item.profileUrl) ?? text(item.url) ?? text(item.publicProfileUrl),
    });
  }
  return profiles;
}

// ============================================================================
// Service
// ============================================================================

type ActionOutcome = { success: true; data: unknown } | { success: false; error: string };

export class LinkedInService {
  private readonly credentials: CredentialCache;
  private readonly logger: Logger;

  constructor(private readonly connector: ConnectorClient, options: LinkedInServiceOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.credentials = options.credentials ?? new CredentialCache({ kind: 'access token', logger: this.logger });
  }

  setup(entityId: EntityId = DEFAULT_ENTITY_ID): Promise<SetupResult> {
    return setupConnection(this.connector, 'linkedin', entityId, undefined, CHANNEL_LABELS.linkedin, this.logger);
  }

  async searchProfiles(search: ProfileSearch): Promise<ServiceResult<{ profiles: LinkedInProfile[] }>> {
    const outcome = await this.run(
      LINKEDIN_ACTIONS.search,
      search,
      (token) => ({ keywords: search.keywords, limit: search.limit ?? DEFAULT_SEARCH_LIMIT, token }),
      'Failed to search LinkedIn profiles',
      'Error searching LinkedIn profiles'
    );
    if (!outcome.success) return outcome;

    const profiles = parseProfiles(outcome.data);
    return {
      success: true,
      message: `Found ${profiles.length} profiles matching your search`,
      profiles,
    };
  }

  async sendConnectionRequest(request: ConnectionRequest): Promise<ServiceResult<{ note: string }>> {
    const note = request.message?.trim() || DEFAULT_CONNECTION_NOTE;
    const outcome = await this.run(
      LINKEDIN_ACTIONS.connect,
      request,
      (token) => ({ profileUrl: request.profileUrl, message: note, token }),
      'Failed to send connection request',
      'Error sending connection request'
    );
    if (!outcome.success) return outcome;

    return { success: true, message: 'Connection request sent successfully', note };
  }

  async sendMessage(request: DirectMessage): Promise<ServiceResult> {
    const outcome = await this.run(
      LINKEDIN_ACTIONS.message,
      request,
      (token) => ({ profileId: request.profileId, message: request.message, token }),
      'Failed to send message',
      'Error sending message'
    );
    if (!outcome.success) return outcome;

    return { success: true, message: 'Message sent successfully' };
  }

  async createPost(request: PostRequest): Promise<ServiceResult<{ postId?: string | undefined }>> {
    const outcome = await this.run(
      LINKEDIN_ACTIONS.post,
      request,
      (token) => ({
        content: request.content,
        token,
        ...(request.imageUrl ? { imageUrl: request.imageUrl } : {}),
        ...(request.articleUrl ? { articleUrl: request.articleUrl } : {}),
      }),
      'Failed to create post',
      'Error creating post'
    );
    if (!outcome.success) return outcome;

    const postId = isRecord(outcome.data) ? text(outcome.data.id) : undefined;
    return { success: true, message: 'Post created successfully', postId };
  }

  async listActions(): Promise<ServiceResult<{ actions: LinkedInAction[] }>> {
    try {
      const all = await this.connector.listActions('linkedin');
      const actions = all
        .filter((action) => action.name.toUpperCase().includes('LINKEDIN'))
        .map((action) => ({
          name: action.name,
          description: action.description ?? 'No description available',
        }));

      return { success: true, message: `Found ${actions.length} LinkedIn actions`, actions };
    } catch (error) {
      this.logger.error('Error listing LinkedIn actions', { error: errorMessage(error) });
      return failure(`Error listing LinkedIn actions: ${errorMessage(error)}`);
    }
  }

  /**
   * Resolve the token, walk the candidate actions and normalize the response
   */
  private async run(
    candidates: readonly string[],
    auth: Authenticated,
    buildArgs: (token: string) => Record<string, unknown>,
    rejectedPrefix: string,
    errorPrefix: string
  ): Promise<ActionOutcome> {
    const entityId = auth.entityId ?? DEFAULT_ENTITY_ID;
    const token = this.credentials.resolve(entityId, auth.accessToken);
    if (!token) {
      this.logger.warn('No usable LinkedIn access token', { entityId });
      return failure(INVALID_TOKEN);
    }

    try {
      const { action, response } = await executeWithFallback(
        this.connector,
        candidates,
        buildArgs(token),
        { entityId },
        this.logger
      );

      const result = normalizeActionResponse(response);
      if (!result.success) {
        this.logger.warn(rejectedPrefix, { action, error: result.error });
        return failure(`${rejectedPrefix}: ${result.error}`);
      }
      return result;
    } catch (error) {
      this.logger.error(errorPrefix, { entityId, error: errorMessage(error) });
      return failure(`${errorPrefix}: ${errorMessage(error)}`);
    }
  }
}
