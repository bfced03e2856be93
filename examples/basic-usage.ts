// ============================================
// STRATA - Usage Examples
// ============================================

import * as path from 'path';
import { ConsoleLogger, MigrationManager, ModelRegistry, Schema, connect, field } from '../src';

// 1. Schema tanımla
// -----------------

const UserSchema = new Schema({
  id: field('SERIAL').onAdd('NOT NULL'),
  email: field('varchar(255)').unique(),
  name: field('varchar(255)').index('gin:gin_trgm_ops'),
  age: field('integer').onAdd('DEFAULT 18')
});

const PostSchema = new Schema(
  {
    id: 'SERIAL',
    author_id: field('integer').index('btree'),
    slug: 'varchar(120)',
    title: 'text'
  },
  {
    table: 'blog_posts',
    uniqueGroups: { author_slug: ['author_id', 'slug'] }
  }
);

// Later: widen a column and drop an index once it is no longer needed
// PostSchema.add('body', field('text').onAdd("DEFAULT ''"));
// author_id: field('integer').index('-btree')


// 2. Registry
// -----------

export const registry = new ModelRegistry();
registry.model('User', UserSchema);
registry.model('Post', PostSchema);


// 3. Migration oluştur ve uygula
// ------------------------------

async function main(): Promise<void> {
  const logger = new ConsoleLogger();
  const migrationsDir = path.join(__dirname, 'migrations');

  // Generation needs no database
  const planner = new MigrationManager({ migrationsDir, registry, logger });
  const generated = await planner.generate({ yes: true });
  if (!generated.success) {
    throw generated.error ?? new Error('Migration generation failed');
  }

  const db = await connect({ uri: process.env.DATABASE_URL ?? 'postgres://localhost:5432/app' });

  try {
    const manager = new MigrationManager({ migrationsDir, registry, adapter: db, logger, timeout: 30000 });
    const applied = await manager.apply();

    for (const item of applied.models) {
      console.log(`${item.model}: applied ${item.applied.join(', ') || 'nothing'}`);
    }

    for (const status of await manager.status()) {
      console.log(`${status.model} is at #${status.lastAppliedSequence}`);
    }
  } finally {
    await db.disconnect();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
