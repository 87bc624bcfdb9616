import type { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  await Promise.resolve();

  pgm.createTable('day_plans', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('gen_random_uuid()'),
    },
    plan_date: {
      type: 'date',
      notNull: true,
      unique: true,
    },
    subjects: {
      type: 'text[]',
      notNull: true,
      default: pgm.func("'{}'::text[]"),
    },
    topics: {
      type: 'text[]',
      notNull: true,
      default: pgm.func("'{}'::text[]"),
    },
    shortfall: {
      type: 'jsonb',
      notNull: false,
      comment: 'Set when the due pool could not meet the daily minimum',
    },
    created_at: {
      type: 'timestamptz',
      notNull: true,
      default: pgm.func('current_timestamp'),
    },
  });

  pgm.createTable('day_plan_items', {
    plan_id: {
      type: 'uuid',
      notNull: true,
      references: 'day_plans(id)',
      onDelete: 'CASCADE',
    },
    item_id: {
      type: 'varchar(100)',
      notNull: true,
      references: 'reviewable_items(id)',
      onDelete: 'CASCADE',
    },
    position: {
      type: 'integer',
      notNull: true,
    },
    subject: {
      type: 'varchar(100)',
      notNull: true,
    },
    due_date: {
      type: 'date',
      notNull: true,
    },
    topics: {
      type: 'text[]',
      notNull: true,
      default: pgm.func("'{}'::text[]"),
    },
  });

  pgm.addConstraint('day_plan_items', 'day_plan_items_pkey', {
    primaryKey: ['plan_id', 'position'],
  });

  pgm.addConstraint('day_plan_items', 'day_plan_items_unique_item', {
    unique: ['plan_id', 'item_id'],
  });

  pgm.addConstraint('day_plan_items', 'valid_position', {
    check: 'position >= 0',
  });

  pgm.createIndex('day_plan_items', 'item_id');
}

export function down(pgm: MigrationBuilder): void {
  pgm.dropTable('day_plan_items');
  pgm.dropTable('day_plans');
}
