import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import { createRecordCodec } from '../../src/codec/record-codec';
import { ValidationError } from '../../src/error/ValidationError';
import { describeRecord } from '../../src/record/descriptor';
import { agentLinks, agentShape, zeroAgent, type AgentConfig } from '../fixtures';

const codec = createRecordCodec(describeRecord(z.object(agentShape), agentLinks));

const sample = (): AgentConfig => ({
    image: 'registry/agent:1.0',
    imageInherited: true,
    replicas: 2,
    replicasInherited: false,
    enabled: true,
    env: { LOG_LEVEL: 'debug' },
    tags: ['blue'],
    expiresAt: new Date('2024-05-01T00:00:00.000Z'),
    limits: { cpu: 1, memory: 256, memoryInherited: false },
});

describe('codec/record-codec', () => {
    describe('encode', () => {
        test('should lower-case field keys and serialize dates', () => {
            expect(codec.encode(sample())).toEqual({
                image: 'registry/agent:1.0',
                imageinherited: true,
                replicas: 2,
                replicasinherited: false,
                enabled: true,
                env: { LOG_LEVEL: 'debug' },
                tags: ['blue'],
                expiresat: '2024-05-01T00:00:00.000Z',
                limits: { cpu: 1, memory: 256, memoryinherited: false },
            });
        });

        test('should leave out unset optional fields', () => {
            expect(Object.keys(codec.encode(zeroAgent()))).toEqual([
                'image',
                'imageinherited',
                'replicas',
                'replicasinherited',
                'enabled',
                'limits',
            ]);
        });

        test('should reject values that are not objects', () => {
            expect(() => codec.encode(JSON.parse('[]')))
                .toThrow('A record object is required as value, received: array');
        });

        test('should store bigints as decimal strings', () => {
            const counters = createRecordCodec(describeRecord(z.object({
                total: z.bigint(),
                resetAt: z.date().nullable(),
            })));

            expect(counters.encode({ total: BigInt('9007199254740993'), resetAt: null }))
                .toEqual({ total: '9007199254740993', resetat: null });
            expect(counters.decode({ total: '9007199254740993', resetat: null }))
                .toEqual({ total: BigInt('9007199254740993'), resetAt: null });
        });
    });

    describe('decode', () => {
        test('should restore an encoded record', () => {
            expect(codec.decode(codec.encode(sample()))).toEqual(sample());
        });

        test('should decode a missing record to the zero value', () => {
            expect(codec.decode(undefined)).toEqual(zeroAgent());
        });

        test('should read keys case-insensitively', () => {
            expect(codec.decode({ IMAGE: 'registry/agent:2.0', Replicas: 4, LIMITS: { Memory: 64 } })).toEqual({
                ...zeroAgent(),
                image: 'registry/agent:2.0',
                replicas: 4,
                limits: { cpu: 0, memory: 64, memoryInherited: false },
            });
        });

        test('should read a null stored for a non-nullable field as unset', () => {
            expect(codec.decode({ replicas: null, env: null })).toEqual(zeroAgent());
        });

        test('should ignore unknown keys', () => {
            expect(codec.decode({ image: 'registry/agent:2.0', retired: true }))
                .toEqual({ ...zeroAgent(), image: 'registry/agent:2.0' });
        });

        test('should reject stored values of the wrong type', () => {
            expect(() => codec.decode({ replicas: 'many' })).toThrow(ValidationError);
            expect(() => codec.decode({ replicas: 'many' }))
                .toThrow('Stored record does not match the record schema (replicas: Expected number, received string)');
        });
    });

    describe('encodeField', () => {
        test('should resolve dotted names case-insensitively under the value container', () => {
            expect(codec.encodeField('Limits.Memory', 2048)).toEqual({ path: 'val.limits.memory', value: 2048 });
        });

        test('should encode the value for the field it names', () => {
            expect(codec.encodeField('expiresAt', new Date('2024-01-02T00:00:00.000Z')))
                .toEqual({ path: 'val.expiresat', value: '2024-01-02T00:00:00.000Z' });
            expect(codec.encodeField('env.LOG_LEVEL', 'info'))
                .toEqual({ path: 'val.env.log_level', value: 'info' });
        });

        test('should encode fields missing from the schema generically', () => {
            expect(codec.encodeField('legacy.since', new Date('2020-01-01T00:00:00.000Z')))
                .toEqual({ path: 'val.legacy.since', value: '2020-01-01T00:00:00.000Z' });
        });

        test('should check the value against the field schema', () => {
            expect(() => codec.encodeField('replicas', 'many')).toThrow(ValidationError);
            expect(() => codec.encodeField('replicas', 'many'))
                .toThrow('Value of field "replicas" does not match the record schema (root: Expected number, received string)');
            expect(() => codec.encodeField('env.LOG_LEVEL', 5))
                .toThrow('Value of field "env.LOG_LEVEL" does not match the record schema (root: Expected string, received number)');
        });

        test('should reject names that reach the prototype chain', () => {
            expect(() => codec.encodeField('__proto__.polluted', 'yes')).toThrow('Unsafe field name: "__proto__.polluted"');
            expect(() => codec.encodeField('env.Constructor', 'yes')).toThrow('Unsafe field name: "env.Constructor"');
        });

        test('should reject empty name segments', () => {
            expect(() => codec.encodeField('limits..memory', 1)).toThrow('Invalid field name: "limits..memory"');
            expect(() => codec.encodeField('', 1)).toThrow('Invalid field name: ""');
        });
    });

    describe('fieldPath', () => {
        test('should resolve the stored path without a value', () => {
            expect(codec.fieldPath('Limits.Memory')).toBe('val.limits.memory');
            expect(codec.fieldPath('replicas')).toBe('val.replicas');
        });

        test('should reject unsafe and empty names', () => {
            expect(() => codec.fieldPath('prototype')).toThrow('Unsafe field name: "prototype"');
            expect(() => codec.fieldPath('limits.')).toThrow('Invalid field name: "limits."');
        });
    });
});
