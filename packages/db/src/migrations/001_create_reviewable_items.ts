import type { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  await Promise.resolve();

  pgm.createTable('reviewable_items', {
    id: {
      type: 'varchar(100)',
      primaryKey: true,
    },
    subject: {
      type: 'varchar(100)',
      notNull: true,
    },
    topics: {
      type: 'text[]',
      notNull: true,
      default: pgm.func("'{}'::text[]"),
    },
    repetition_count: {
      type: 'integer',
      notNull: true,
      default: 0,
      comment: 'Consecutive successful reviews, reset on failure',
    },
    ease_factor: {
      type: 'numeric(5,2)',
      notNull: true,
      default: 2.5,
    },
    current_interval_days: {
      type: 'integer',
      notNull: true,
      default: 0,
    },
    due_date: {
      type: 'date',
      notNull: true,
      comment: 'UTC day of last review plus the current interval',
    },
    last_reviewed_at: {
      type: 'timestamptz',
      notNull: false,
    },
    created_at: {
      type: 'timestamptz',
      notNull: true,
      default: pgm.func('current_timestamp'),
    },
    updated_at: {
      type: 'timestamptz',
      notNull: true,
      default: pgm.func('current_timestamp'),
    },
  });

  pgm.addConstraint('reviewable_items', 'valid_ease_factor', {
    check: 'ease_factor > 0',
  });

  pgm.addConstraint('reviewable_items', 'valid_interval', {
    check: 'current_interval_days BETWEEN 0 AND 36500',
  });

  pgm.addConstraint('reviewable_items', 'valid_repetition_count', {
    check: 'repetition_count >= 0',
  });

  pgm.createIndex('reviewable_items', ['due_date', 'id']);
  pgm.createIndex('reviewable_items', 'subject');

  pgm.sql(`
    CREATE OR REPLACE FUNCTION update_reviewable_items_timestamp()
    RETURNS TRIGGER AS $$
    BEGIN
      NEW.updated_at = current_timestamp;
      RETURN NEW;
    END;
    $$ LANGUAGE plpgsql;
  `);

  pgm.sql(`
    CREATE TRIGGER reviewable_items_updated_at
      BEFORE UPDATE ON reviewable_items
      FOR EACH ROW
      EXECUTE FUNCTION update_reviewable_items_timestamp();
  `);
}

export function down(pgm: MigrationBuilder): void {
  pgm.sql('DROP TRIGGER IF EXISTS reviewable_items_updated_at ON reviewable_items;');
  pgm.sql('DROP FUNCTION IF EXISTS update_reviewable_items_timestamp();');
  pgm.dropTable('reviewable_items');
}
