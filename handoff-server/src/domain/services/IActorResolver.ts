import { Actor } from '../../types';

/**
 * Resolves an opaque credential into the calling actor.
 * Token issuance and storage live outside this service.
 */
export interface IActorResolver {
  /**
   * @returns The actor the credential belongs to, or null if it is unknown
   */
  resolve(credential: string): Promise<Actor | null>;
}
