import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('backends', (table) => {
    table.increments('id').primary();
    table.string('name', 128).notNullable().unique();
    table.string('addr', 255).notNullable();
    table.text('description').nullable();
    table.integer('enabled').notNullable().defaultTo(1);
    table.text('created_at').notNullable();
    table.text('updated_at').notNullable();
  });

  await knex.schema.createTable('routes', (table) => {
    table.increments('id').primary();
    table.string('http_method', 16).notNullable();
    table.string('http_pattern', 512).notNullable();
    table.string('backend_name', 128).notNullable();
    table.string('backend_service', 255).notNullable();
    table.string('backend_method', 255).notNullable();
    table.integer('timeout_ms').notNullable().defaultTo(5000);
    table.text('description').nullable();
    table.integer('enabled').notNullable().defaultTo(1);
    table.text('created_at').notNullable();
    table.text('updated_at').notNullable();
    table.index(['http_method', 'http_pattern'], 'idx_routes_method_pattern');
    table.index(['backend_name'], 'idx_routes_backend_name');
  });

  await knex.schema.createTable('config_history', (table) => {
    table.increments('id').primary();
    table.string('config_type', 16).notNullable();
    table.integer('config_id').nullable();
    table.string('operation', 16).notNullable();
    table.text('old_value').nullable();
    table.text('new_value').nullable();
    table.string('operator', 255).nullable();
    table.text('created_at').notNullable();
    table.index(['config_type', 'config_id'], 'idx_history_config');
    table.index(['created_at'], 'idx_history_created_at');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('config_history');
  await knex.schema.dropTableIfExists('routes');
  await knex.schema.dropTableIfExists('backends');
}
