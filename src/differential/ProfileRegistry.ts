import fs from 'fs';
import path from 'path';
import { EventEmitter } from 'events';
import { z } from 'zod';
import { createServerProfile, type ServerProfile } from './types/ServerProfile.js';
import { ProfileConfigurationError, UnknownProfileError } from './ErrorHandler.js';
import { getConfigurationManager } from './ConfigurationManager.js';
import { isByteString } from './headers.js';
import { BYTE_STRING_MESSAGE, byteString, headerNameSchema } from './schemas.js';

export const serverProfileSchema = z
    .object({
        name: z.string().min(1),
        addedHeaders: z.array(headerNameSchema).optional(),
        removedHeaders: z.array(headerNameSchema).optional(),
        trashedHeaders: z.array(headerNameSchema).optional(),
        headerNameTranslation: z
            .record(z.string(), headerNameSchema)
            .refine(translation => Object.keys(translation).every(name => name !== '' && isByteString(name)), {
                message: `header names ${BYTE_STRING_MESSAGE}`,
            })
            .optional(),
        supportsPersistence: z.boolean().optional(),
        allowsHttp09: z.boolean().optional(),
        requiresLengthInPost: z.boolean().optional(),
        allowsMissingHostHeader: z.boolean().optional(),
        methodWhitelist: z.array(byteString).nullable().optional(),
        methodCharacterBlacklist: byteString.optional(),
    })
    .strict();

export const profileTableSchema = z.object({
    profiles: z.array(serverProfileSchema).min(1),
});

export type ServerProfileDefinition = z.infer<typeof serverProfileSchema>;

/**
 * Validates a raw profile table and turns it into frozen profiles
 */
export function parseProfileTable(raw: unknown): ServerProfile[] {
    const result = profileTableSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue.path.join('.');
        throw new ProfileConfigurationError(`Invalid profile table at ${field || '<root>'}: ${issue.message}`, field);
    }

    const seen = new Set<string>();
    return result.data.profiles.map(({ name, ...quirks }, index) => {
        if (seen.has(name)) {
            throw new ProfileConfigurationError(`Duplicate profile name "${name}"`, `profiles.${index}.name`);
        }
        seen.add(name);
        return createServerProfile(name, quirks);
    });
}

/**
 * Holds the quirk profile of every known target server, loaded from a JSON table
 */
export class ProfileRegistry extends EventEmitter {
    private readonly profilesPath: string;
    private profiles: Map<string, ServerProfile>;
    private lastModified = 0;
    private watchInterval?: NodeJS.Timeout;

    constructor(profilesPath: string) {
        super();
        this.profilesPath = path.resolve(process.cwd(), profilesPath);
        this.profiles = this.loadProfiles();
    }

    getProfile(name: string): ServerProfile {
        const profile = this.profiles.get(name);
        if (!profile) {
            throw new UnknownProfileError(name);
        }
        return profile;
    }

    /**
     * Look up several profiles, preserving order
     */
    getProfiles(names: readonly string[]): ServerProfile[] {
        return names.map(name => this.getProfile(name));
    }

    hasProfile(name: string): boolean {
        return this.profiles.has(name);
    }

    listProfiles(): ServerProfile[] {
        return Array.from(this.profiles.values());
    }

    /**
     * Re-read the profile table; the current table is kept if the new one is invalid
     */
    reload(): void {
        const previous = this.profiles;
        this.profiles = this.loadProfiles();
        console.info('Server profiles reloaded', { count: this.profiles.size });
        this.emit('profilesReloaded', this.listProfiles(), Array.from(previous.values()));
    }

    /**
     * Reload whenever the table's modification time changes
     */
    startWatching(intervalMs: number = 5000): void {
        if (this.watchInterval) {
            this.stopWatching();
        }

        this.watchInterval = setInterval(() => {
            try {
                if (fs.statSync(this.profilesPath).mtimeMs !== this.lastModified) {
                    this.reload();
                }
            } catch (error) {
                console.error('Error reloading server profiles', { error });
            }
        }, intervalMs);

        console.info('Server profile hot-reloading started', { intervalMs });
    }

    stopWatching(): void {
        if (this.watchInterval) {
            clearInterval(this.watchInterval);
            this.watchInterval = undefined;
            console.info('Server profile hot-reloading stopped');
        }
    }

    private loadProfiles(): Map<string, ServerProfile> {
        let raw: unknown;
        try {
            this.lastModified = fs.statSync(this.profilesPath).mtimeMs;
            raw = JSON.parse(fs.readFileSync(this.profilesPath, 'utf-8'));
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ProfileConfigurationError(`Cannot read profile table ${this.profilesPath}: ${reason}`);
        }

        return new Map(parseProfileTable(raw).map(profile => [profile.name, profile]));
    }

    destroy(): void {
        this.stopWatching();
        this.removeAllListeners();
    }
}

// Singleton instance
let profileRegistry: ProfileRegistry | null = null;

export function getProfileRegistry(): ProfileRegistry {
    if (!profileRegistry) {
        profileRegistry = new ProfileRegistry(getConfigurationManager().getConfig().profilesPath);
    }
    return profileRegistry;
}

/**
 * Replace the global registry with one reading `profilesPath`
 */
export function initializeProfileRegistry(profilesPath: string): ProfileRegistry {
    if (profileRegistry) {
        profileRegistry.destroy();
    }
    profileRegistry = new ProfileRegistry(profilesPath);
    return profileRegistry;
}
