import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { scanMarkers, scanMarkersInText } from './scanner.js';
import { parseMarker } from './marker.js';
import { MacroErrorCode } from './error-codes.js';

async function collect(filePath: string): Promise<string[]> {
    const tags: string[] = [];
    for await (const marker of scanMarkers(filePath)) {
        tags.push(marker.tag);
    }
    return tags;
}

describe('scanMarkersInText', () => {
    it('returns markers in first-occurrence order without duplicates', () => {
        const text = [
            'FROM alpine:3.4',
            '#[base:alpine-3]',
            '#[apache:alpine-3]',
            'RUN echo done',
            '#[base:alpine-3]',
        ].join('\n');

        expect(scanMarkersInText(text).map((m) => m.tag)).toEqual([
            'base:alpine-3',
            'apache:alpine-3',
        ]);
    });

    it('describes family, selector and the delimited token', () => {
        expect(scanMarkersInText('#[php-nginx:ubuntu-16.04]')).toEqual([
            {
                tag: 'php-nginx:ubuntu-16.04',
                family: 'php-nginx',
                selector: 'ubuntu-16.04',
                token: '#[php-nginx:ubuntu-16.04]',
            },
        ]);
    });

    it('finds markers embedded within a line', () => {
        expect(scanMarkersInText('RUN true #[nginx:centos-7] && false').map((m) => m.tag)).toEqual([
            'nginx:centos-7',
        ]);
    });

    it('ignores tokens that do not follow the grammar', () => {
        const text = [
            'FROM webdevops/base:alpine-3',
            '#[apache]',
            '#[apache:alpine:3]',
            '#[apache:alpine_3]',
            '#[:alpine-3]',
            '# [apache:alpine-3]',
        ].join('\n');

        expect(scanMarkersInText(text)).toEqual([]);
    });
});

describe('scanMarkers', () => {
    let tempDir: string;
    let dockerfile: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dockform-scan-'));
        dockerfile = path.join(tempDir, 'Dockerfile');
        fs.writeFileSync(dockerfile, 'FROM scratch\n#[apache:alpine-3]\n#[php:alpine-3]\n');
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('reads the markers of a file', async () => {
        expect(await collect(dockerfile)).toEqual(['apache:alpine-3', 'php:alpine-3']);
    });

    it('rereads the file on every call', async () => {
        await collect(dockerfile);
        fs.writeFileSync(dockerfile, 'FROM scratch\n#[nginx:centos-7]\n');

        expect(await collect(dockerfile)).toEqual(['nginx:centos-7']);
    });

    it('fails with a read error for a missing file', async () => {
        const missing = path.join(tempDir, 'missing', 'Dockerfile');

        await expect(collect(missing)).rejects.toMatchObject({
            code: MacroErrorCode.FILE_READ_FAILED,
            context: { path: missing, operation: 'read' },
        });
    });
});

describe('parseMarker', () => {
    it('splits a tag into family and selector', () => {
        expect(parseMarker('apache:alpine-3')).toMatchObject({
            family: 'apache',
            selector: 'alpine-3',
            token: '#[apache:alpine-3]',
        });
    });

    it('rejects malformed tags', () => {
        for (const tag of ['apache', 'a:b:c', ':x', 'x:', 'a b:c']) {
            expect(() => parseMarker(tag)).toThrow(/Invalid macro marker/);
        }
    });
});
