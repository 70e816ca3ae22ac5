import { Actor } from '../../types';
import { IActorResolver } from '../../domain/services/IActorResolver';
import { ApiTokenEntry } from '../config/Config';

/**
 * Resolves bearer tokens from a fixed table loaded at startup.
 */
export class StaticTokenActorResolver implements IActorResolver {
  private actors: Map<string, Actor>;

  constructor(entries: readonly ApiTokenEntry[]) {
    this.actors = new Map(
      entries.map(e => [e.token, e.name ? { id: e.actorId, name: e.name } : { id: e.actorId }])
    );
  }

  async resolve(credential: string): Promise<Actor | null> {
    const actor = this.actors.get(credential);
    return actor ? { ...actor } : null;
  }
}
