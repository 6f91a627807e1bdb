import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
    ProfileRegistry,
    getProfileRegistry,
    initializeProfileRegistry,
    parseProfileTable,
} from '../src/differential/ProfileRegistry.js';
import { ProfileConfigurationError, UnknownProfileError } from '../src/differential/ErrorHandler.js';
import { DEFAULT_SERVER_PROFILE, type ServerProfile } from '../src/differential/types/ServerProfile.js';

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}

describe('parseProfileTable', () => {
    test('should fill unspecified quirks with defaults', () => {
        const [profile] = parseProfileTable({ profiles: [{ name: 'plain' }] });

        expect(profile).toEqual({ ...DEFAULT_SERVER_PROFILE, name: 'plain' });
        expect(Object.isFrozen(profile)).toBe(true);
        expect(Object.isFrozen(profile.addedHeaders)).toBe(true);
    });

    test('should keep declared quirks', () => {
        const [profile] = parseProfileTable({
            profiles: [{ name: 'gateway', headerNameTranslation: { 'Content-Type': 'CONTENT_TYPE' }, methodWhitelist: ['GET'] }],
        });

        expect(profile.headerNameTranslation).toEqual({ 'Content-Type': 'CONTENT_TYPE' });
        expect(profile.methodWhitelist).toEqual(['GET']);
    });

    test('should reject unknown profile fields', () => {
        const error = captureError(() => parseProfileTable({ profiles: [{ name: 'plain', keepAlive: true }] }));

        expect(error).toBeInstanceOf(ProfileConfigurationError);
        expect(error).toMatchObject({ field: 'profiles.0' });
    });

    test('should reject header names outside the byte range', () => {
        const error = captureError(() => parseProfileTable({ profiles: [{ name: 'plain', addedHeaders: ['X-Ā'] }] }));

        expect(error).toBeInstanceOf(ProfileConfigurationError);
        expect(error).toMatchObject({
            field: 'profiles.0.addedHeaders.0',
            message: 'Invalid profile table at profiles.0.addedHeaders.0: must only contain byte values 0x00-0xFF',
        });
    });

    test('should reject an empty table', () => {
        const error = captureError(() => parseProfileTable({ profiles: [] }));

        expect(error).toMatchObject({ name: 'ProfileConfigurationError', field: 'profiles' });
    });

    test('should reject duplicate names', () => {
        const error = captureError(() => parseProfileTable({ profiles: [{ name: 'plain' }, { name: 'plain' }] }));

        expect(error).toMatchObject({ message: 'Duplicate profile name "plain"', field: 'profiles.1.name' });
    });
});

describe('ProfileRegistry', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'profiles-'));
        jest.spyOn(console, 'info').mockImplementation(() => {});
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    function writeTable(profiles: object[]): string {
        const file = path.join(tempDir, 'profiles.json');
        fs.writeFileSync(file, JSON.stringify({ profiles }));
        return file;
    }

    test('should load the shipped profile table', () => {
        const registry = new ProfileRegistry('config/profiles.json');

        expect(registry.listProfiles().map(profile => profile.name)).toEqual([
            'reference',
            'forwarding-proxy',
            'wsgi-gateway',
            'legacy-daemon',
            'strict-origin',
            'tracing-sidecar',
        ]);
        expect(registry.getProfile('wsgi-gateway').requiresLengthInPost).toBe(true);
        expect(registry.getProfile('strict-origin').methodCharacterBlacklist).toBe('\u0000\t\n\r #/:@');

        registry.destroy();
    });

    test('should look profiles up by name, preserving order', () => {
        const registry = new ProfileRegistry(writeTable([{ name: 'a' }, { name: 'b' }]));

        expect(registry.getProfiles(['b', 'a', 'b']).map(profile => profile.name)).toEqual(['b', 'a', 'b']);
        expect(registry.hasProfile('a')).toBe(true);
        expect(registry.hasProfile('c')).toBe(false);
        expect(() => registry.getProfile('c')).toThrow(new UnknownProfileError('c'));

        registry.destroy();
    });

    test('should fail on a missing table', () => {
        const error = captureError(() => new ProfileRegistry(path.join(tempDir, 'missing.json')));

        expect(error).toBeInstanceOf(ProfileConfigurationError);
        expect(error instanceof Error && error.message.startsWith('Cannot read profile table')).toBe(true);
    });

    test('should fail on a table that is not JSON', () => {
        const file = path.join(tempDir, 'broken.json');
        fs.writeFileSync(file, '{ "profiles": [');

        expect(() => new ProfileRegistry(file)).toThrow(ProfileConfigurationError);
    });

    test('should emit profilesReloaded with the new and previous profiles', () => {
        const file = writeTable([{ name: 'a' }]);
        const registry = new ProfileRegistry(file);
        const listener = jest.fn<(current: ServerProfile[], previous: ServerProfile[]) => void>();
        registry.on('profilesReloaded', listener);

        writeTable([{ name: 'a' }, { name: 'b', supportsPersistence: false }]);
        registry.reload();

        expect(registry.getProfile('b').supportsPersistence).toBe(false);
        expect(listener).toHaveBeenCalledTimes(1);
        const [current, previous] = listener.mock.calls[0];
        expect(current.map(profile => profile.name)).toEqual(['a', 'b']);
        expect(previous.map(profile => profile.name)).toEqual(['a']);

        registry.destroy();
    });

    test('should keep the current table when a reload fails', () => {
        const file = writeTable([{ name: 'a' }]);
        const registry = new ProfileRegistry(file);

        fs.writeFileSync(file, JSON.stringify({ profiles: [{ name: 'a' }, { name: 'a' }] }));

        expect(() => registry.reload()).toThrow('Duplicate profile name "a"');
        expect(registry.listProfiles().map(profile => profile.name)).toEqual(['a']);

        registry.destroy();
    });

    describe('startWatching', () => {
        beforeEach(() => {
            jest.useFakeTimers();
        });

        afterEach(() => {
            jest.useRealTimers();
        });

        function touch(file: string, isoDate: string): void {
            const time = new Date(isoDate);
            fs.utimesSync(file, time, time);
        }

        test('should reload when the table\'s modification time changes', () => {
            const file = writeTable([{ name: 'a' }]);
            const registry = new ProfileRegistry(file);
            const listener = jest.fn<(current: ServerProfile[], previous: ServerProfile[]) => void>();
            registry.on('profilesReloaded', listener);

            registry.startWatching(20);
            jest.advanceTimersByTime(20);
            expect(listener).not.toHaveBeenCalled();

            writeTable([{ name: 'a' }, { name: 'b' }]);
            touch(file, '2026-01-02T00:00:00Z');
            jest.advanceTimersByTime(20);

            expect(registry.hasProfile('b')).toBe(true);
            expect(listener).toHaveBeenCalledTimes(1);

            jest.advanceTimersByTime(60);
            expect(listener).toHaveBeenCalledTimes(1);

            registry.destroy();
        });

        test('should log a failed reload and keep the current table', () => {
            const consoleError = jest.spyOn(console, 'error').mockImplementation(() => {});
            const file = writeTable([{ name: 'a' }]);
            const registry = new ProfileRegistry(file);
            registry.startWatching(20);

            fs.writeFileSync(file, JSON.stringify({ profiles: [{ name: 'a', keepAlive: true }] }));
            touch(file, '2026-01-03T00:00:00Z');

            expect(() => jest.advanceTimersByTime(20)).not.toThrow();
            expect(registry.listProfiles().map(profile => profile.name)).toEqual(['a']);
            expect(consoleError).toHaveBeenCalledTimes(1);
            expect(consoleError).toHaveBeenCalledWith('Error reloading server profiles', {
                error: expect.any(ProfileConfigurationError),
            });

            registry.destroy();
        });

        test('should clear the polling interval when stopped', () => {
            const registry = new ProfileRegistry(writeTable([{ name: 'a' }]));

            registry.startWatching(20);
            expect(jest.getTimerCount()).toBe(1);

            registry.stopWatching();
            expect(jest.getTimerCount()).toBe(0);

            registry.destroy();
        });

        test('should replace an existing interval when started twice', () => {
            const registry = new ProfileRegistry(writeTable([{ name: 'a' }]));

            registry.startWatching(20);
            registry.startWatching(50);
            expect(jest.getTimerCount()).toBe(1);

            registry.destroy();
            expect(jest.getTimerCount()).toBe(0);
        });
    });

    describe('initializeProfileRegistry', () => {
        test('should replace the shared registry and stop the previous one', () => {
            jest.useFakeTimers();
            const first = initializeProfileRegistry(writeTable([{ name: 'a' }]));
            first.startWatching(20);

            expect(getProfileRegistry()).toBe(first);
            expect(getProfileRegistry().hasProfile('a')).toBe(true);

            const second = initializeProfileRegistry(writeTable([{ name: 'b' }]));

            expect(getProfileRegistry()).toBe(second);
            expect(second.hasProfile('b')).toBe(true);
            expect(jest.getTimerCount()).toBe(0);

            second.destroy();
            jest.useRealTimers();
        });
    });
});
