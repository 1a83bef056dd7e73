/**
 * Tables and columns the latest tenant migration produces. Used to recognise
 * a schema that exists without migration history.
 */

export const EXPECTED_TABLES: readonly string[] = ['users'];

export const EXPECTED_COLUMNS: Readonly<Record<string, readonly string[]>> = {
  users: [
    'id',
    'telegram_id',
    'username',
    'first_name',
    'last_name',
    'is_active',
    'language_code',
    'created_at',
    'updated_at',
  ],
};
