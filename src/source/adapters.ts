import type { SourceDefinition } from '../shared/config.js';
import type { AdapterContext, SourceAdapter } from './adapter.js';
import { MatchDbAdapter } from './matchDb.js';
import { RssAdapter } from './rss.js';
import { WikipediaAdapter } from './wikipedia.js';

export function createAdapter(definition: SourceDefinition, ctx: AdapterContext): SourceAdapter {
  switch (definition.kind) {
    case 'wikipedia':
      return new WikipediaAdapter(definition, ctx);
    case 'rss':
      return new RssAdapter(definition, ctx);
    case 'match_db':
      return new MatchDbAdapter(definition, ctx);
    default: {
      const unknownKind: never = definition;
      return unknownKind;
    }
  }
}
