import { Knex } from 'knex';
import { EVENT_STATUSES } from '../types/ticketing.types';

/**
 * Ticketing tables read by the analytics engine.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('organizers', (table) => {
    table.increments('id');
    table.string('name', 255).notNullable().unique();
    table.string('contact_email', 254);
    table.text('description');
  });

  await knex.schema.createTable('users', (table) => {
    table.increments('id');
    table.string('username', 150).notNullable().unique();
    table.string('email', 254);
  });

  await knex.schema.createTable('events', (table) => {
    table.increments('id');
    table.string('name', 255).notNullable();
    table.integer('organizer_id').unsigned().notNullable()
      .references('id').inTable('organizers').onDelete('CASCADE');
    table.enu('status', [...EVENT_STATUSES]).notNullable().defaultTo('draft');
    table.timestamp('start_time').notNullable();
    table.timestamp('end_time').notNullable();
    table.string('location', 255);
    table.integer('capacity').unsigned().nullable();
    table.decimal('base_ticket_price', 10, 2).notNullable().defaultTo(0);

    table.index(['status', 'end_time']);
    table.check('capacity IS NULL OR capacity >= 0', {}, 'events_capacity_non_negative');
  });

  await knex.schema.createTable('ticket_types', (table) => {
    table.increments('id');
    table.integer('event_id').unsigned().notNullable()
      .references('id').inTable('events').onDelete('CASCADE');
    table.string('name', 100).notNullable();
    table.decimal('price', 10, 2).notNullable();
    table.integer('quantity_available').unsigned().notNullable().defaultTo(0);
    table.boolean('is_active').notNullable().defaultTo(true);

    table.index('event_id');
  });

  await knex.schema.createTable('orders', (table) => {
    table.increments('id');
    table.integer('customer_id').unsigned().nullable()
      .references('id').inTable('users').onDelete('SET NULL');
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.decimal('total_amount', 10, 2).notNullable().defaultTo(0);
    table.boolean('is_paid').notNullable().defaultTo(false);
    table.string('discount_code', 50);

    table.index('customer_id');
  });

  await knex.schema.createTable('ticket_purchases', (table) => {
    table.increments('id');
    table.integer('order_id').unsigned().notNullable()
      .references('id').inTable('orders').onDelete('CASCADE');
    table.integer('ticket_type_id').unsigned().notNullable()
      .references('id').inTable('ticket_types').onDelete('RESTRICT');
    table.integer('quantity').unsigned().notNullable().defaultTo(1);
    table.decimal('unit_price', 10, 2).notNullable();

    table.index('order_id');
    table.index('ticket_type_id');
    table.check('quantity > 0', {}, 'ticket_purchases_quantity_positive');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('ticket_purchases');
  await knex.schema.dropTableIfExists('orders');
  await knex.schema.dropTableIfExists('ticket_types');
  await knex.schema.dropTableIfExists('events');
  await knex.schema.dropTableIfExists('users');
  await knex.schema.dropTableIfExists('organizers');
}
