// repodrive type definitions

import type { Config } from '../config/index.js';
import type { Drive } from '../drive/index.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    drive: Drive;
  }
}
