import fp from 'fastify-plugin';
import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export interface DatabasePluginOptions {
  /** SQLite file path, or ':memory:' */
  path: string;
}

export default fp<DatabasePluginOptions>(async (fastify, opts) => {
  if (opts.path !== ':memory:') {
    mkdirSync(dirname(opts.path), { recursive: true });
  }

  const db = new Database(opts.path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  fastify.log.info({ path: opts.path }, 'SQLite database opened');

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    db.close();
  });
}, { name: 'database' });
