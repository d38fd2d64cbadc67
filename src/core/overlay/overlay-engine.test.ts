import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { overlayConfiguration, clearConfiguration } from './overlay-engine.js';
import { deployBaselayout } from './baselayout.js';
import { OverlayLock } from './overlay-lock.js';
import { OverlayErrorCode } from './error-codes.js';
import type { Variant } from '../variants/types.js';
import { createMockLogger, loggedMessages } from '../logger/test-utils.js';

function write(filePath: string, content: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
}

/** Relative path -> content of every file below a directory */
function snapshotTree(root: string): Record<string, string> {
    const files: Record<string, string> = {};
    const walk = (dir: string) => {
        for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                walk(full);
            } else {
                files[path.relative(root, full).split(path.sep).join('/')] = fs.readFileSync(
                    full,
                    'utf8'
                );
            }
        }
    };
    walk(root);
    return files;
}

describe('overlayConfiguration', () => {
    let baseDir: string;
    let bundleA: string;
    let bundleB: string;
    let alpine: Variant;
    let centos: Variant;

    function makeVariant(name: string): Variant {
        const familyPath = path.join(baseDir, 'docker', 'php');
        const variantPath = path.join(familyPath, name);
        write(path.join(variantPath, 'Dockerfile'), 'FROM scratch\n');
        return { name, familyPath, path: variantPath, hasDefinition: true };
    }

    beforeEach(() => {
        baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockform-overlay-'));
        bundleA = path.join(baseDir, 'provisioning', 'php', 'general');
        bundleB = path.join(baseDir, 'provisioning', 'php', 'alpine');
        write(path.join(bundleA, 'etc', 'php.ini'), 'memory_limit=128M');
        write(path.join(bundleA, 'provision', 'main.yml'), 'general');
        write(path.join(bundleB, 'etc', 'php.ini'), 'memory_limit=256M');
        write(path.join(bundleB, 'etc', 'apk.conf'), 'apk');
        alpine = makeVariant('alpine-3');
        centos = makeVariant('centos-7');
    });

    afterEach(() => {
        fs.rmSync(baseDir, { recursive: true, force: true });
    });

    it('copies the bundle into conf/ preserving structure', async () => {
        const result = await overlayConfiguration(bundleA, [alpine, centos], {
            clearFirst: true,
            logger: createMockLogger(),
        });

        const expected = { 'etc/php.ini': 'memory_limit=128M', 'provision/main.yml': 'general' };
        expect(snapshotTree(path.join(alpine.path, 'conf'))).toEqual(expected);
        expect(snapshotTree(path.join(centos.path, 'conf'))).toEqual(expected);
        expect(result).toEqual({ applied: [alpine, centos], failed: [] });
    });

    it('gives the same result when run twice with clearing', async () => {
        const logger = createMockLogger();
        await overlayConfiguration(bundleA, [alpine], { clearFirst: true, logger });
        const once = snapshotTree(path.join(alpine.path, 'conf'));

        await overlayConfiguration(bundleA, [alpine], { clearFirst: true, logger });

        expect(snapshotTree(path.join(alpine.path, 'conf'))).toEqual(once);
    });

    it('layers a second bundle with precedence on collisions', async () => {
        const logger = createMockLogger();
        await overlayConfiguration(bundleA, [alpine], { clearFirst: true, logger });
        await overlayConfiguration(bundleB, [alpine], { clearFirst: false, logger });

        expect(snapshotTree(path.join(alpine.path, 'conf'))).toEqual({
            'etc/apk.conf': 'apk',
            'etc/php.ini': 'memory_limit=256M',
            'provision/main.yml': 'general',
        });
    });

    it('removes stale files only when clearing', async () => {
        write(path.join(alpine.path, 'conf', 'stale.txt'), 'old');
        write(path.join(centos.path, 'conf', 'stale.txt'), 'old');

        await overlayConfiguration(bundleB, [alpine], { clearFirst: true, logger: createMockLogger() });
        await overlayConfiguration(bundleB, [centos], { logger: createMockLogger() });

        expect(fs.existsSync(path.join(alpine.path, 'conf', 'stale.txt'))).toBe(false);
        expect(fs.readFileSync(path.join(centos.path, 'conf', 'stale.txt'), 'utf8')).toBe('old');
    });

    it('logs one progress line per variant relative to the base dir', async () => {
        const logger = createMockLogger();

        await overlayConfiguration(bundleA, [alpine, centos], { logger, baseDir });

        expect(loggedMessages(logger, 'info')).toEqual([
            '    - docker/php/alpine-3',
            '    - docker/php/centos-7',
        ]);
    });

    it('rejects a missing source before touching any variant', async () => {
        write(path.join(alpine.path, 'conf', 'keep.txt'), 'keep');

        await expect(
            overlayConfiguration(path.join(baseDir, 'provisioning', 'nope'), [alpine], {
                clearFirst: true,
                logger: createMockLogger(),
            })
        ).rejects.toMatchObject({ code: OverlayErrorCode.SOURCE_UNREADABLE });
        expect(fs.existsSync(path.join(alpine.path, 'conf', 'keep.txt'))).toBe(true);
    });

    it('rejects a source that is a file', async () => {
        await expect(
            overlayConfiguration(path.join(bundleA, 'etc', 'php.ini'), [alpine], {
                logger: createMockLogger(),
            })
        ).rejects.toMatchObject({
            code: OverlayErrorCode.SOURCE_UNREADABLE,
            context: { reason: 'not a directory' },
        });
    });

    describe('failure modes', () => {
        beforeEach(() => {
            // a file where conf/ should be makes the copy fail for that variant
            write(path.join(alpine.path, 'conf'), 'not a directory');
        });

        it('aborts on the first failure in strict mode', async () => {
            await expect(
                overlayConfiguration(bundleA, [alpine, centos], { logger: createMockLogger() })
            ).rejects.toMatchObject({
                code: OverlayErrorCode.COPY_FAILED,
                context: {
                    variant: 'alpine-3',
                    source: bundleA,
                    target: path.join(alpine.path, 'conf'),
                },
            });
            expect(fs.existsSync(path.join(centos.path, 'conf'))).toBe(false);
        });

        it('records the failure and continues in lenient mode', async () => {
            const logger = createMockLogger();

            const result = await overlayConfiguration(bundleA, [alpine, centos], {
                mode: 'lenient',
                logger,
            });

            expect(result.applied).toEqual([centos]);
            expect(result.failed).toHaveLength(1);
            expect(result.failed[0]?.variant).toBe(alpine);
            expect(result.failed[0]?.error.code).toBe(OverlayErrorCode.COPY_FAILED);
            expect(logger.warn).toHaveBeenCalledTimes(1);
            expect(snapshotTree(path.join(centos.path, 'conf'))).toEqual({
                'etc/php.ini': 'memory_limit=128M',
                'provision/main.yml': 'general',
            });
        });
    });
});

describe('clearConfiguration', () => {
    it('removes conf/ of every variant', async () => {
        const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockform-overlay-'));
        const variantPath = path.join(baseDir, 'docker', 'nginx', 'alpine');
        write(path.join(variantPath, 'conf', 'nginx', 'site.conf'), 'server {}');
        const variant: Variant = {
            name: 'alpine',
            familyPath: path.dirname(variantPath),
            path: variantPath,
            hasDefinition: true,
        };

        await clearConfiguration([variant], { logger: createMockLogger() });

        expect(fs.existsSync(path.join(variantPath, 'conf'))).toBe(false);
        fs.rmSync(baseDir, { recursive: true, force: true });
    });
});

describe('deployBaselayout', () => {
    it('replaces the previous bootstrap copy', async () => {
        const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockform-baselayout-'));
        const baselayout = path.join(baseDir, 'baselayout');
        write(path.join(baselayout, 'usr', 'local', 'bin', 'service'), '#!/bin/sh');
        const variantPath = path.join(baseDir, 'docker', 'bootstrap', 'ubuntu-16.04');
        write(path.join(variantPath, 'baselayout', 'old-script'), 'old');
        const variant: Variant = {
            name: 'ubuntu-16.04',
            familyPath: path.dirname(variantPath),
            path: variantPath,
            hasDefinition: true,
        };

        const result = await deployBaselayout(baselayout, [variant], { logger: createMockLogger() });

        expect(result.applied).toEqual([variant]);
        expect(snapshotTree(path.join(variantPath, 'baselayout'))).toEqual({
            'usr/local/bin/service': '#!/bin/sh',
        });
        fs.rmSync(baseDir, { recursive: true, force: true });
    });
});

describe('OverlayLock', () => {
    it('runs work on the same directory one after another', async () => {
        const lock = new OverlayLock();
        const events: string[] = [];
        let releaseFirst: () => void = () => {};
        const firstGate = new Promise<void>((resolve) => {
            releaseFirst = resolve;
        });

        const first = lock.run('/tmp/variant/conf', async () => {
            events.push('first:start');
            await firstGate;
            events.push('first:end');
        });
        const second = lock.run('/tmp/variant/conf', async () => {
            events.push('second');
        });
        const other = lock.run('/tmp/other/conf', async () => {
            events.push('other');
        });

        await other;
        expect(events).toEqual(['first:start', 'other']);

        releaseFirst();
        await Promise.all([first, second]);

        expect(events).toEqual(['first:start', 'other', 'first:end', 'second']);
        expect(lock.size).toBe(0);
    });

    it('releases the directory when the work fails', async () => {
        const lock = new OverlayLock();

        await expect(
            lock.run('/tmp/variant/conf', async () => {
                throw new Error('copy failed');
            })
        ).rejects.toThrow('copy failed');

        await expect(lock.run('/tmp/variant/conf', async () => 'next')).resolves.toBe('next');
    });
});
