import { vi } from 'vitest';
import { z } from 'zod';
import type { RecordLinks, RecordValue } from '../src/record/descriptor';
import type { Logger } from '../src/types';

export const agentShape = {
    image: z.string(),
    imageInherited: z.boolean(),
    replicas: z.number(),
    replicasInherited: z.boolean(),
    enabled: z.boolean(),
    env: z.record(z.string(), z.string()).optional(),
    tags: z.array(z.string()).optional(),
    expiresAt: z.date().optional(),
    limits: z.object({
        cpu: z.number(),
        memory: z.number(),
        memoryInherited: z.boolean(),
    }),
    proxy: z.object({ host: z.string() }).optional(),
};

export type AgentConfig = RecordValue<typeof agentShape>;

export const agentLinks: RecordLinks<AgentConfig> = {
    inherited: { image: 'imageInherited', replicas: 'replicasInherited' },
    nested: { limits: { inherited: { memory: 'memoryInherited' } } },
};

export const zeroAgent = (): AgentConfig => ({
    image: '',
    imageInherited: false,
    replicas: 0,
    replicasInherited: false,
    enabled: false,
    limits: { cpu: 0, memory: 0, memoryInherited: false },
});

export const baseAgent = (): AgentConfig => ({
    image: 'registry/agent:1.0',
    imageInherited: false,
    replicas: 3,
    replicasInherited: false,
    enabled: true,
    env: { a: '1', b: '2' },
    limits: { cpu: 2, memory: 512, memoryInherited: false },
});

export const createMockLogger = (): Logger => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    silly: vi.fn(),
});
