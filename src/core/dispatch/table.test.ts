import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadTargetTable, parseTargetTable, targetNames } from './table.js';
import { DispatchErrorCode } from './error-codes.js';
import { DockformValidationError } from '../errors/DockformValidationError.js';
import { isDockformRuntimeError } from '../errors/DockformRuntimeError.js';

describe('loadTargetTable', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockform-table-'));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('loads the shipped table in provisioning order', async () => {
        const table = await loadTargetTable();

        expect(targetNames(table)).toEqual([
            'bootstrap',
            'Dockerfile',
            'base',
            'base-app',
            'apache',
            'nginx',
            'hhvm',
            'hhvm-apache',
            'hhvm-nginx',
            'php',
            'php-apache',
            'php-nginx',
            'postfix',
            'mail-sandbox',
            'vsftp',
            'typo3',
            'piwik',
            'samson-deployment',
        ]);
    });

    it('applies step defaults from the shipped table', async () => {
        const table = await loadTargetTable();
        const php = table.targets.find((target) => target.name === 'php');

        expect(php?.steps).toEqual([
            { type: 'clear', family: 'php', filter: '*' },
            { type: 'configuration', bundle: 'php/general', family: 'php', filter: '*', clear: false },
            {
                type: 'configuration',
                bundle: 'php/ubuntu-12.04',
                family: 'php',
                filter: 'ubuntu-12.04',
                clear: false,
            },
            {
                type: 'configuration',
                bundle: 'php/alpine',
                family: 'php',
                filter: 'alpine-*',
                clear: false,
            },
            { type: 'configuration', bundle: 'php/php7', family: 'php', filter: '*-php7', clear: false },
        ]);
    });

    it('reads a table from a custom path', async () => {
        const tablePath = path.join(tempDir, 'targets.yml');
        fs.writeFileSync(
            tablePath,
            'targets:\n  - name: web\n    header: acme-web\n    steps:\n      - { type: macros }\n'
        );

        const table = await loadTargetTable(tablePath);

        expect(table).toEqual({
            targets: [{ name: 'web', header: 'acme-web', steps: [{ type: 'macros' }] }],
        });
    });

    it('fails with TABLE_READ_ERROR for a missing file', async () => {
        const error = await loadTargetTable(path.join(tempDir, 'missing.yml')).catch(
            (e: unknown) => e
        );

        expect(isDockformRuntimeError(error, DispatchErrorCode.TABLE_READ_ERROR)).toBe(true);
    });

    it('fails with TABLE_PARSE_ERROR for malformed YAML', async () => {
        const tablePath = path.join(tempDir, 'targets.yml');
        fs.writeFileSync(tablePath, 'targets: [\n');

        const error = await loadTargetTable(tablePath).catch((e: unknown) => e);

        expect(isDockformRuntimeError(error, DispatchErrorCode.TABLE_PARSE_ERROR)).toBe(true);
    });
});

describe('parseTargetTable', () => {
    const step = { type: 'macros' };

    it('rejects duplicate target names', () => {
        let caught: unknown;
        try {
            parseTargetTable({
                targets: [
                    { name: 'php', steps: [step] },
                    { name: 'php', steps: [step] },
                ],
            });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(DockformValidationError);
        expect(caught).toMatchObject({
            issues: [{ message: "Duplicate target 'php'", path: ['targets', 1, 'name'] }],
        });
    });

    it('reserves the name "all"', () => {
        expect(() => parseTargetTable({ targets: [{ name: 'all', steps: [step] }] })).toThrow(
            'Target name "all" is reserved'
        );
    });

    it('rejects unknown step types', () => {
        expect(() =>
            parseTargetTable({ targets: [{ name: 'php', steps: [{ type: 'archive' }] }] })
        ).toThrow(DockformValidationError);
    });

    it('rejects a family that is a path', () => {
        expect(() =>
            parseTargetTable({
                targets: [{ name: 'php', steps: [{ type: 'clear', family: '../php' }] }],
            })
        ).toThrow('Family must be a single directory name');
    });
});
