import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

export const leaderboard = sqliteTable('leaderboard', {
  track: text('track').primaryKey().notNull(),
  discord_channel: text('discord_channel').notNull(),
  weather_condition: integer('weather_condition').notNull(),
  weather_temperature: real('weather_temperature').notNull(),
  weather_rain: real('weather_rain').notNull(),
  grip_level: integer('grip_level'),
  allowed_classes: text('allowed_classes', { mode: 'json' }).$type<number[]>().notNull().default(sql`'[]'`),
  show_technical: integer('show_technical', { mode: 'boolean' }).notNull().default(false),
  time_of_day: integer('time_of_day').notNull().default(0),
  fixed_setup: integer('fixed_setup', { mode: 'boolean' }).notNull().default(false),
  created_at: text('created_at').default(sql`(CURRENT_TIMESTAMP)`),
  updated_at: text('updated_at').default(sql`(CURRENT_TIMESTAMP)`),
});

export const lapTime = sqliteTable('lap_time', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  track: text('track').notNull().references(() => leaderboard.track),
  driver_id: text('driver_id').notNull(),
  driver_name: text('driver_name').notNull(),
  car: text('car').notNull(),
  car_class: text('car_class'),
  lap_time: real('lap_time'),
  sector1: real('sector1'),
  sector2: real('sector2'),
  created_at: text('created_at').default(sql`(CURRENT_TIMESTAMP)`),
  updated_at: text('updated_at').default(sql`(CURRENT_TIMESTAMP)`),
},
(t) => [
  uniqueIndex('lap_time_track_driver_unique').on(t.track, t.driver_id),
  index('idx_lap_time_track').on(t.track, t.lap_time),
]);

export const blacklist = sqliteTable('blacklist', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  driver_id: text('driver_id').notNull().unique(),
  reason: text('reason'),
  blacklisted_at: text('blacklisted_at').default(sql`(CURRENT_TIMESTAMP)`),
});

export const authSession = sqliteTable('auth_session', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  driver_id: text('driver_id').notNull(),
  driver_name: text('driver_name').notNull(),
  token: text('token').notNull().unique(),
  created_at: text('created_at').default(sql`(CURRENT_TIMESTAMP)`),
},
(t) => [
  index('idx_auth_session_driver').on(t.driver_id),
]);

export type Leaderboard = typeof leaderboard.$inferSelect;
export type NewLeaderboard = typeof leaderboard.$inferInsert;

export type LapTime = typeof lapTime.$inferSelect;
export type NewLapTime = typeof lapTime.$inferInsert;

export type BlacklistEntry = typeof blacklist.$inferSelect;
export type NewBlacklistEntry = typeof blacklist.$inferInsert;

export type AuthSession = typeof authSession.$inferSelect;
export type NewAuthSession = typeof authSession.$inferInsert;
