import { eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { sysConfig } from "../db/schema";

/**
 * Key-value settings stored in the database: API keys, SMTP password,
 * imported resume text. Values are stored JSON-encoded.
 */
export class ConfigManager {
    constructor(private readonly db: AppDatabase) {}

    async get<T>(key: string, defaultValue?: T): Promise<T | undefined> {
        const result = this.db.select().from(sysConfig).where(eq(sysConfig.key, key)).get();
        if (!result) return defaultValue;
        try {
            return JSON.parse(result.value) as T;
        } catch {
            // Rows written by hand may hold a bare string
            return result.value as unknown as T;
        }
    }

    async set(key: string, value: unknown, group: string = "core"): Promise<void> {
        const strValue = JSON.stringify(value);

        this.db.insert(sysConfig).values({
            key,
            value: strValue,
            group,
            updatedAt: new Date().toISOString()
        }).onConflictDoUpdate({
            target: sysConfig.key,
            set: { value: strValue, updatedAt: new Date().toISOString() }
        }).run();
    }

    async list(group?: string) {
        if (group) {
            return this.db.select().from(sysConfig).where(eq(sysConfig.group, group)).all();
        }
        return this.db.select().from(sysConfig).all();
    }

    /** Stored secret first, then the named environment variable. */
    async getSecret(key: string, envVar?: string): Promise<string | undefined> {
        const stored = await this.get<string>(key);
        if (stored) return stored;
        return envVar ? process.env[envVar] || undefined : undefined;
    }
}
