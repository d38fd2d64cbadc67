import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { listFamilies, discoverVariants, listVariants } from './variant-discovery.js';
import { VariantErrorCode } from './error-codes.js';

function createTempDir() {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'dockform-variants-'));
}

function addVariant(dockerRoot: string, family: string, name: string, withDockerfile = true) {
    const dir = path.join(dockerRoot, family, name);
    fs.mkdirSync(dir, { recursive: true });
    if (withDockerfile) {
        fs.writeFileSync(path.join(dir, 'Dockerfile'), 'FROM scratch\n');
    }
}

describe('variant discovery', () => {
    let dockerRoot: string;

    beforeEach(() => {
        dockerRoot = createTempDir();
        addVariant(dockerRoot, 'php', 'centos-7');
        addVariant(dockerRoot, 'php', 'alpine-3');
        addVariant(dockerRoot, 'php', 'ubuntu-16.04-php7');
        addVariant(dockerRoot, 'php', 'notes', false);
        addVariant(dockerRoot, 'nginx', 'alpine');
        fs.writeFileSync(path.join(dockerRoot, 'php', 'README.md'), 'docs');
    });

    afterEach(() => {
        fs.rmSync(dockerRoot, { recursive: true, force: true });
    });

    it('lists families in name order', async () => {
        expect(await listFamilies(dockerRoot)).toEqual(['nginx', 'php']);
    });

    it('describes every variant directory', async () => {
        const variants = await discoverVariants(dockerRoot, 'php');

        expect(variants.map((v) => [v.name, v.hasDefinition])).toEqual([
            ['alpine-3', true],
            ['centos-7', true],
            ['notes', false],
            ['ubuntu-16.04-php7', true],
        ]);
        expect(variants[0]).toEqual({
            name: 'alpine-3',
            familyPath: path.join(dockerRoot, 'php'),
            path: path.join(dockerRoot, 'php', 'alpine-3'),
            hasDefinition: true,
        });
    });

    it('keeps only matching variants with a Dockerfile', async () => {
        expect((await listVariants(dockerRoot, 'php', '*')).map((v) => v.name)).toEqual([
            'alpine-3',
            'centos-7',
            'ubuntu-16.04-php7',
        ]);
        expect((await listVariants(dockerRoot, 'php', 'centos-*')).map((v) => v.name)).toEqual([
            'centos-7',
        ]);
        expect((await listVariants(dockerRoot, 'php', '*-php7')).map((v) => v.name)).toEqual([
            'ubuntu-16.04-php7',
        ]);
    });

    it('does not count a Dockerfile directory as a definition', async () => {
        fs.mkdirSync(path.join(dockerRoot, 'nginx', 'debian', 'Dockerfile'), { recursive: true });

        const variants = await discoverVariants(dockerRoot, 'nginx');

        expect(variants.map((variant) => [variant.name, variant.hasDefinition])).toEqual([
            ['alpine', true],
            ['debian', false],
        ]);
        expect(await listVariants(dockerRoot, 'nginx', '*')).toHaveLength(1);
    });

    it('reports a missing family', async () => {
        await expect(listVariants(dockerRoot, 'ghost', '*')).rejects.toMatchObject({
            code: VariantErrorCode.FAMILY_NOT_FOUND,
            context: { family: 'ghost', familyPath: path.join(dockerRoot, 'ghost') },
        });
    });
});
