import * as fs from 'fs/promises';
import * as path from 'path';
import { DocumentStore, MapDocument, YamlDocumentStore, fromPlain, scalar } from '@internal/config-document';
import {
    FailedPreconditionError,
    Instance,
    InstanceRegistry,
    InternalError,
    InvalidInputError,
    NotFoundError,
    ProviderError,
    RegistryView,
    ResolutionEngine,
    detectMode,
    setLogLevel,
    shapeResult
} from '../src/index.js';
import { ConfigDirs } from './helpers/config-dir.js';

async function captureError(promise: Promise<unknown>): Promise<ProviderError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof ProviderError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected the promise to reject');
}

function fakeInstance(alias: string, files: string[] = ['app']): Instance {
    return {
        alias,
        directory: `/configs/${alias}`,
        files: new Map(files.map(name => [name, `/configs/${alias}/${name}.yaml`])),
        ready: true
    };
}

function fakeView(instances: Instance[]): RegistryView {
    const byAlias = new Map(instances.map(instance => [instance.alias, instance]));
    return {
        get: (alias: string) => byAlias.get(alias),
        size: byAlias.size,
        sole: () => (byAlias.size === 1 ? instances[0] : undefined)
    };
}

class RecordingStore implements DocumentStore {
    public calls: string[] = [];

    constructor(private docs: Record<string, Record<string, unknown>>) { }

    async parse(absolutePath: string): Promise<MapDocument> {
        this.calls.push(absolutePath);
        const doc = fromPlain(this.docs[absolutePath] ?? {});
        if (doc.kind !== 'map') {
            throw new Error('expected map');
        }
        return doc;
    }
}

describe('detectMode', () => {
    it('should pick explicit mode when segment 0 is an alias', () => {
        const a = fakeInstance('a');
        const result = detectMode(fakeView([a, fakeInstance('b')]), 'a');
        expect(result).toEqual({ mode: 'explicit', instance: a });
    });

    it('should prefer the alias over implicit mode with a single instance', () => {
        const only = fakeInstance('only');
        expect(detectMode(fakeView([only]), 'only')).toEqual({ mode: 'explicit', instance: only });
    });

    it('should pick implicit mode with exactly one instance', () => {
        const only = fakeInstance('only');
        expect(detectMode(fakeView([only]), 'app')).toEqual({ mode: 'implicit', instance: only });
    });

    it('should report an empty registry', () => {
        expect(detectMode(fakeView([]), 'app')).toEqual({ mode: 'uninitialized' });
    });

    it('should report ambiguity with several instances and no alias match', () => {
        expect(detectMode(fakeView([fakeInstance('a'), fakeInstance('b')]), 'app')).toEqual({ mode: 'ambiguous' });
    });

    it('should always land in exactly one mode', () => {
        const registries = [[], [fakeInstance('a')], [fakeInstance('a'), fakeInstance('b')]];
        const heads = ['a', 'b', 'app', '*'];
        for (const instances of registries) {
            for (const head of heads) {
                const { mode } = detectMode(fakeView(instances), head);
                expect(['explicit', 'implicit', 'uninitialized', 'ambiguous']).toContain(mode);
            }
        }
    });
});

describe('shapeResult', () => {
    it('should return maps unchanged and wrap everything else', () => {
        expect(shapeResult(fromPlain({ a: 1 }))).toEqual({ a: 1 });
        expect(shapeResult(scalar('myapp'))).toEqual({ value: 'myapp' });
        expect(shapeResult(fromPlain(['x', 'y']))).toEqual({ value: ['x', 'y'] });
    });
});

describe('ResolutionEngine', () => {
    const dirs = new ConfigDirs();
    let registry: InstanceRegistry;
    let engine: ResolutionEngine;

    beforeAll(() => {
        setLogLevel('silent');
    });

    beforeEach(() => {
        registry = new InstanceRegistry();
        engine = new ResolutionEngine(registry, new YamlDocumentStore());
    });

    afterEach(async () => {
        await dirs.cleanup();
    });

    describe('path validation', () => {
        it('should reject an empty path', async () => {
            const error = await captureError(engine.fetch([]));
            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error.message).toBe('path cannot be empty');
        });

        it('should reject an empty first segment', async () => {
            const error = await captureError(engine.fetch(['', 'x']));
            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error.message).toBe('path[0] cannot be empty');
        });
    });

    it('should fail with FailedPrecondition when nothing is registered', async () => {
        const error = await captureError(engine.fetch(['anything']));
        expect(error).toBeInstanceOf(FailedPreconditionError);
        expect(error.message).toBe('no provider instances initialized');
    });

    describe('single instance', () => {
        beforeEach(async () => {
            const dir = await dirs.create({
                'app.yaml': [
                    'name: myapp',
                    'tags: [blue, green]',
                    'server:',
                    '  port: 8080',
                    '  tls:',
                    '    enabled: true',
                    '"*":',
                    '  literal: yes-it-is',
                    ''
                ].join('\n')
            });
            await registry.register({ alias: 'x', config: { directory: dir } });
        });

        it('should read segment 0 as a file name', async () => {
            expect(await engine.fetch(['app', 'name'])).toEqual({ value: 'myapp' });
        });

        it('should still accept the alias prefix', async () => {
            expect(await engine.fetch(['x', 'app', 'name'])).toEqual({ value: 'myapp' });
        });

        it('should return a whole file', async () => {
            const result = await engine.fetch(['app']);
            expect(result).toEqual({
                name: 'myapp',
                tags: ['blue', 'green'],
                server: { port: 8080, tls: { enabled: true } },
                '*': { literal: 'yes-it-is' }
            });
        });

        it('should wrap lists', async () => {
            expect(await engine.fetch(['app', 'tags'])).toEqual({ value: ['blue', 'green'] });
        });

        it('should return nested maps unwrapped', async () => {
            expect(await engine.fetch(['app', 'server', 'tls'])).toEqual({ enabled: true });
        });

        it('should require a file name after the alias', async () => {
            const error = await captureError(engine.fetch(['x']));
            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error.message).toBe('path must contain at least [alias, filename]');
        });

        it('should report an unknown file', async () => {
            const error = await captureError(engine.fetch(['nope']));
            expect(error).toBeInstanceOf(NotFoundError);
            expect(error.message).toBe('file "nope" not found in provider instance "x"');
        });

        it('should report a missing key with file and alias', async () => {
            const error = await captureError(engine.fetch(['x', 'app', 'server', 'host']));
            expect(error).toBeInstanceOf(NotFoundError);
            expect(error.message).toBe('path element "host" not found in file "app" (provider instance "x")');
        });

        it('should refuse to navigate through a scalar', async () => {
            const error = await captureError(engine.fetch(['x', 'app', 'name', 'first']));
            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error.message).toBe(
                'cannot navigate to path ["x","app","name","first"]: element at index 3 is not a map'
            );
        });

        it('should refuse to navigate through a list', async () => {
            const error = await captureError(engine.fetch(['app', 'tags', '0']));
            expect(error).toBeInstanceOf(InvalidInputError);
        });

        it('should expand a map with a trailing wildcard', async () => {
            expect(await engine.fetch(['x', 'app', 'server', '*'])).toEqual({ port: 8080, tls: { enabled: true } });
        });

        it('should reject a trailing wildcard after a scalar', async () => {
            const error = await captureError(engine.fetch(['x', 'app', 'name', '*']));
            expect(error).toBeInstanceOf(InvalidInputError);
            expect(error.message).toBe(
                'cannot expand path ["x","app","name","*"]: wildcard at index 3 applied to a non-map value'
            );
        });

        it('should treat a wildcard in the middle as an ordinary key', async () => {
            expect(await engine.fetch(['app', '*', 'literal'])).toEqual({ value: 'yes-it-is' });
        });
    });

    describe('multiple instances', () => {
        beforeEach(async () => {
            const dir1 = await dirs.create({ 'db.yaml': 'host: db.internal\n' });
            const dir2 = await dirs.create({ 'net.yaml': 'cidr: 10.0.0.0/8\nmtu: 1500\n' });
            await registry.register({ alias: 'a', config: { directory: dir1 } });
            await registry.register({ alias: 'b', config: { directory: dir2 } });
        });

        it('should not find a file of another instance', async () => {
            const error = await captureError(engine.fetch(['a', 'net']));
            expect(error).toBeInstanceOf(NotFoundError);
            expect(error.message).toBe('file "net" not found in provider instance "a"');
        });

        it('should fetch from the named instance', async () => {
            expect(await engine.fetch(['b', 'net'])).toEqual({ cidr: '10.0.0.0/8', mtu: 1500 });
        });

        it('should require the alias prefix', async () => {
            const error = await captureError(engine.fetch(['net']));
            expect(error).toBeInstanceOf(NotFoundError);
            expect(error.message).toBe(
                'provider instance "net" not found (hint: with multiple instances, path must start with alias)'
            );
        });
    });

    describe('merge-all wildcard', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await dirs.create({
                'beta.yaml': 'app:\n  port: "2222"\n  env: prod\n',
                'alpha.yaml': 'app:\n  name: alpha\n  port: "1111"\n'
            });
            await registry.register({ alias: 'x', config: { directory: dir } });
        });

        it('should merge every file in base-name order', async () => {
            expect(await engine.fetch(['*'])).toEqual({
                app: { name: 'alpha', port: '2222', env: 'prod' }
            });
        });

        it('should navigate into the merged document', async () => {
            expect(await engine.fetch(['x', '*', 'app', 'port'])).toEqual({ value: '2222' });
        });

        it('should be deterministic across calls', async () => {
            const first = JSON.stringify(await engine.fetch(['*']));
            const second = JSON.stringify(await engine.fetch(['*']));
            expect(second).toBe(first);
        });

        it('should name the wildcard when a merged key is missing', async () => {
            const error = await captureError(engine.fetch(['*', 'db']));
            expect(error.message).toBe('path element "db" not found in file "*" (provider instance "x")');
        });

        it('should read files fresh on every fetch', async () => {
            await fs.writeFile(path.join(dir, 'beta.yaml'), 'app:\n  port: "3333"\n');
            expect(await engine.fetch(['*', 'app'])).toEqual({ name: 'alpha', port: '3333' });
        });
    });

    it('should order merges by base name rather than file name', async () => {
        const dir = await dirs.create({
            'a.yaml': 'winner: a\n',
            'a-b.yaml': 'winner: a-b\n'
        });
        await registry.register({ alias: 'x', config: { directory: dir } });
        expect(await engine.fetch(['*', 'winner'])).toEqual({ value: 'a-b' });
    });

    it('should surface parse failures as Internal', async () => {
        const dir = await dirs.create({ 'broken.yaml': 'key: [unclosed\n' });
        await registry.register({ alias: 'x', config: { directory: dir } });

        const error = await captureError(engine.fetch(['broken']));
        expect(error).toBeInstanceOf(InternalError);
        expect(error.message).toContain(`failed to parse document file "${path.join(dir, 'broken.yaml')}"`);
    });

    it('should parse merged files through the store in sorted order', async () => {
        const instance = fakeInstance('x', ['zeta', 'alpha', 'mid']);
        const store = new RecordingStore({
            '/configs/x/alpha.yaml': { v: 'alpha' },
            '/configs/x/mid.yaml': { v: 'mid' },
            '/configs/x/zeta.yaml': { v: 'zeta' }
        });
        const stubbed = new ResolutionEngine(fakeView([instance]), store);

        expect(await stubbed.fetch(['*'])).toEqual({ v: 'zeta' });
        expect(store.calls).toEqual([
            '/configs/x/alpha.yaml',
            '/configs/x/mid.yaml',
            '/configs/x/zeta.yaml'
        ]);
    });
});
