import type { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  await Promise.resolve();

  // Review outcomes waiting to be applied to their item
  pgm.createTable('review_events', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('gen_random_uuid()'),
    },
    item_id: {
      type: 'varchar(100)',
      notNull: true,
      references: 'reviewable_items(id)',
      onDelete: 'CASCADE',
    },
    quality: {
      type: 'varchar(32)',
      notNull: true,
      comment: 'Raw quality signal as reported',
    },
    occurred_at: {
      type: 'timestamptz',
      notNull: true,
    },
    processed_at: {
      type: 'timestamptz',
      notNull: false,
      comment: 'Set once the event has been applied',
    },
    created_at: {
      type: 'timestamptz',
      notNull: true,
      default: pgm.func('current_timestamp'),
    },
  });

  pgm.createIndex('review_events', ['occurred_at', 'id'], {
    name: 'idx_review_events_unprocessed',
    where: 'processed_at IS NULL',
  });
  pgm.createIndex('review_events', 'item_id');
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('review_events');
}
