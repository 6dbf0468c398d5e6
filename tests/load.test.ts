import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '../src/error/ValidationError';
import { create } from '../src/scoped-config';
import { createMemoryStore } from '../src/store/memory';
import type { ScopeStore } from '../src/store/types';
import type { EngineDefaults } from '../src/types';
import { agentLinks, agentShape, baseAgent, createMockLogger, zeroAgent, type AgentConfig } from './fixtures';

const poolA = (): AgentConfig => ({
    ...zeroAgent(),
    replicas: 5,
    env: { a: '', c: '3' },
    limits: { cpu: 0, memory: 1024, memoryInherited: false },
});

describe('load', () => {
    let store: ScopeStore;

    const createAgents = (defaults?: Partial<EngineDefaults>) => create({
        namespace: 'agent',
        configShape: agentShape,
        links: agentLinks,
        store,
        defaults,
        logger: createMockLogger(),
    });

    beforeEach(() => {
        store = createMemoryStore();
    });

    describe('load', () => {
        it('should layer the pool override onto the base record', async () => {
            const agents = createAgents();
            await agents.saveBase(baseAgent());
            await agents.save('pool-a', poolA());

            expect(await agents.load('pool-a')).toEqual({
                image: 'registry/agent:1.0',
                imageInherited: true,
                replicas: 5,
                replicasInherited: false,
                enabled: true,
                env: { b: '2', c: '3' },
                limits: { cpu: 2, memory: 1024, memoryInherited: false },
            });
        });

        it('should return the stored base record for the base scope', async () => {
            const agents = createAgents();
            await agents.saveBase(baseAgent());

            expect(await agents.load('')).toEqual(baseAgent());
            expect(await agents.loadBase()).toEqual(baseAgent());
        });

        it('should inherit everything for a pool without an entry', async () => {
            const agents = createAgents();
            await agents.saveBase(baseAgent());

            expect(await agents.load('pool-z')).toEqual({
                ...baseAgent(),
                imageInherited: true,
                replicasInherited: true,
                limits: { cpu: 2, memory: 512, memoryInherited: true },
            });
        });

        it('should start from the zero record when no base is stored', async () => {
            const agents = createAgents();
            await agents.save('pool-a', { ...zeroAgent(), image: 'registry/agent:2.0' });

            expect(await agents.loadBase()).toEqual(zeroAgent());
            expect(await agents.load('pool-a')).toEqual({
                ...zeroAgent(),
                image: 'registry/agent:2.0',
                replicasInherited: true,
                limits: { cpu: 0, memory: 0, memoryInherited: true },
            });
        });

        it('should let zero values override when allowEmpty is set', async () => {
            const agents = createAgents({ allowEmpty: true });
            await agents.saveBase(baseAgent());
            await agents.save('pool-a', { ...baseAgent(), replicas: 0, enabled: false });

            const config = await agents.load('pool-a');

            expect(config.replicas).toBe(0);
            expect(config.replicasInherited).toBe(false);
            expect(config.enabled).toBe(false);
        });

        it('should replace whole fields in shallow mode', async () => {
            const agents = createAgents({ shallowMerge: true });
            await agents.saveBase(baseAgent());
            await agents.save('pool-a', poolA());

            expect(await agents.load('pool-a')).toEqual({
                ...baseAgent(),
                replicas: 5,
                env: { a: '', c: '3' },
                limits: { cpu: 0, memory: 1024, memoryInherited: false },
            });
        });
    });

    describe('loadWithBase', () => {
        it('should use the supplied base instead of the stored one', async () => {
            const agents = createAgents();
            await agents.saveBase(baseAgent());
            await agents.save('pool-a', poolA());
            const base: AgentConfig = { ...baseAgent(), image: 'registry/agent:3.0', env: undefined };

            const config = await agents.loadWithBase('pool-a', base);

            expect(config.image).toBe('registry/agent:3.0');
            expect(config.imageInherited).toBe(true);
            expect(config.env).toEqual({ c: '3' });
        });

        it('should return the supplied base for the base scope', async () => {
            const agents = createAgents();
            await agents.saveBase(baseAgent());
            const base: AgentConfig = { ...zeroAgent(), image: 'registry/agent:3.0' };

            expect(await agents.loadWithBase('', base)).toEqual(base);
        });

        it('should fall back to the stored base', async () => {
            const agents = createAgents();
            await agents.saveBase(baseAgent());

            expect(await agents.loadWithBase('')).toEqual(baseAgent());
        });

        it('should reject a base that does not match the record schema', async () => {
            const agents = createAgents();

            await expect(agents.loadWithBase('pool-a', JSON.parse('{"image":1}'))).rejects.toThrow(ValidationError);
            await expect(agents.loadWithBase('pool-a', JSON.parse('{"image":1}')))
                .rejects.toThrow(/^Base record does not match the record schema \(image: Expected string, received number/);
        });
    });

    describe('loadPools', () => {
        it('should resolve every stored pool with the base first', async () => {
            const agents = createAgents();
            await agents.save('pool-b', { ...zeroAgent(), image: 'registry/agent:2.0' });
            await agents.saveBase(baseAgent());
            await agents.save('pool-a', poolA());

            const pools = await agents.loadPools();

            expect(Object.keys(pools)).toEqual(['', 'pool-a', 'pool-b']);
            expect(pools['']).toEqual(baseAgent());
            expect(pools['pool-a']).toEqual(await agents.load('pool-a'));
            expect(pools['pool-b'].image).toBe('registry/agent:2.0');
            expect(pools['pool-b'].imageInherited).toBe(false);
            expect(pools['pool-b'].replicas).toBe(3);
        });

        it('should keep only the requested pools that are stored', async () => {
            const agents = createAgents();
            await agents.saveBase(baseAgent());
            await agents.save('pool-a', poolA());
            await agents.save('pool-b', poolA());

            expect(Object.keys(await agents.loadPools(['pool-b', 'pool-z']))).toEqual(['', 'pool-b']);
            expect(Object.keys(await agents.loadPools(['']))).toEqual(['']);
        });

        it('should treat an empty filter as no filter', async () => {
            const agents = createAgents();
            await agents.save('pool-a', poolA());

            expect(Object.keys(await agents.loadPools([]))).toEqual(['', 'pool-a']);
            expect(Object.keys(await agents.loadAll())).toEqual(['', 'pool-a']);
        });

        it('should return only the zero base for an empty collection', async () => {
            const agents = createAgents();

            expect(await agents.loadAll()).toEqual({ '': zeroAgent() });
        });
    });
});
