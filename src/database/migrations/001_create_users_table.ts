import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('telegram_id', 'bigint', (col) => col.notNull().unique())
    .addColumn('username', 'varchar(255)')
    .addColumn('first_name', 'varchar(255)')
    .addColumn('last_name', 'varchar(255)')
    .addColumn('is_active', 'boolean', (col) =>
      col.notNull().defaultTo(true)
    )
    .addColumn('language_code', 'varchar(10)')
    .addColumn('created_at', 'timestamp', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamp', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createIndex('idx_users_username')
    .on('users')
    .column('username')
    .execute();

  await db.schema
    .createIndex('idx_users_is_active')
    .on('users')
    .column('is_active')
    .execute();

  // Active users ordered by creation or last update
  await db.schema
    .createIndex('idx_users_active_created')
    .on('users')
    .columns(['is_active', 'created_at'])
    .execute();

  await db.schema
    .createIndex('idx_users_active_updated')
    .on('users')
    .columns(['is_active', 'updated_at'])
    .execute();

  await db.schema
    .createIndex('idx_users_language_active')
    .on('users')
    .columns(['language_code', 'is_active'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropIndex('idx_users_language_active').ifExists().execute();
  await db.schema.dropIndex('idx_users_active_updated').ifExists().execute();
  await db.schema.dropIndex('idx_users_active_created').ifExists().execute();
  await db.schema.dropIndex('idx_users_is_active').ifExists().execute();
  await db.schema.dropIndex('idx_users_username').ifExists().execute();

  await db.schema.dropTable('users').execute();
}
