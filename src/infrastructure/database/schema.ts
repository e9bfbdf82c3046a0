import { sqliteTable, text, integer, uniqueIndex, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// -------------------------------------------------------------------------
// Configurations: one JSON settings document per (type, name, version)
// -------------------------------------------------------------------------
export const configurations = sqliteTable('configurations', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    serviceType: text('service_type').notNull(),   // e.g. 'network'
    serviceName: text('service_name').notNull(),   // e.g. 'server', 'client'
    version: text('version').notNull(),
    settings: text('settings').notNull(),          // Raw JSON, validated by the consumer
    createdAt: integer('created_at', { mode: 'timestamp' })
        .notNull()
        .default(sql`(unixepoch())`),
}, (t) => ({
    uniqueService: uniqueIndex('uid_configurations_service').on(t.serviceType, t.serviceName, t.version),
    serviceNameIndex: index('idx_configurations_name').on(t.serviceName),
}));

export type ConfigurationRow = typeof configurations.$inferSelect;
