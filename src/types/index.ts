// Gateway type definitions

import type { ChainProvider } from '../chain/provider.js';
import type { Config } from '../config/index.js';

export interface ServerOptions {
  config: Config;
  /** Injected in tests; built from config.chain otherwise */
  chainProvider?: ChainProvider;
}

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    chainProvider: ChainProvider;
  }
}
