import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../../src/error/ValidationError';
import { describeRecord } from '../../src/record/descriptor';
import { agentLinks, agentShape, zeroAgent } from '../fixtures';

describe('record/descriptor', () => {
    describe('describeRecord', () => {
        test('should list fields in declaration order with their kinds', () => {
            const descriptor = describeRecord(z.object(agentShape), agentLinks);

            expect(descriptor.fields.map(field => [field.name, field.kind])).toEqual([
                ['image', 'leaf'],
                ['replicas', 'leaf'],
                ['enabled', 'leaf'],
                ['env', 'map'],
                ['tags', 'leaf'],
                ['expiresAt', 'time'],
                ['limits', 'record'],
                ['proxy', 'leaf'],
            ]);
        });

        test('should keep companions out of the field list', () => {
            const descriptor = describeRecord(z.object(agentShape), agentLinks);
            const names = descriptor.fields.map(field => field.name);

            expect(names).not.toContain('imageInherited');
            expect(names).not.toContain('replicasInherited');
            expect(descriptor.fields.find(field => field.name === 'image')?.inherited).toBe('imageInherited');
            expect(descriptor.fields.find(field => field.name === 'enabled')?.inherited).toBeUndefined();
        });

        test('should treat companions as plain fields without links', () => {
            const descriptor = describeRecord(z.object(agentShape));

            expect(descriptor.fields.map(field => field.name)).toContain('imageInherited');
        });

        test('should describe nested records with their own links and paths', () => {
            const descriptor = describeRecord(z.object(agentShape), agentLinks);
            const limits = descriptor.fields.find(field => field.name === 'limits');

            expect(limits?.kind).toBe('record');
            if (limits?.kind !== 'record') {
                return;
            }
            expect(limits.layout.fields.map(field => field.path)).toEqual(['limits.cpu', 'limits.memory']);
            expect(limits.layout.fields[1].inherited).toBe('memoryInherited');
        });

        test('should expose the value schema of map fields', () => {
            const descriptor = describeRecord(z.object(agentShape));
            const env = descriptor.fields.find(field => field.name === 'env');

            expect(env?.kind).toBe('map');
            if (env?.kind !== 'map') {
                return;
            }
            expect(env.valueSchema.safeParse('x').success).toBe(true);
            expect(env.valueSchema.safeParse(1).success).toBe(false);
        });

        test('should apply the emptiness policy of the field schema', () => {
            const descriptor = describeRecord(z.object(agentShape));
            const replicas = descriptor.fields.find(field => field.name === 'replicas');

            expect(replicas?.isEmpty(0, false)).toBe(true);
            expect(replicas?.isEmpty(0, true)).toBe(false);
        });

        test('should produce independent zero records', () => {
            const descriptor = describeRecord(z.object(agentShape), agentLinks);
            const first = descriptor.zero();
            first.limits.cpu = 4;

            expect(descriptor.zero()).toEqual(zeroAgent());
        });

        test('should reject unsupported schema types', () => {
            expect(() => describeRecord(z.object({ value: z.union([z.string(), z.number()]) })))
                .toThrow('Invalid record field "value": unsupported schema type ZodUnion');
        });

        test('should require nil-only kinds to be optional or nullable', () => {
            expect(() => describeRecord(z.object({ when: z.date() })))
                .toThrow('Invalid record field "when": date fields must be declared optional or nullable');
            expect(() => describeRecord(z.object({ items: z.array(z.string()) })))
                .toThrow('Invalid record field "items": array fields must be declared optional or nullable');
            expect(() => describeRecord(z.object({ labels: z.record(z.string(), z.string()) })))
                .toThrow('Invalid record field "labels": map fields must be declared optional or nullable');
            expect(() => describeRecord(z.object({ level: z.enum(['low', 'high']) })))
                .toThrow('Invalid record field "level": enum fields must be declared optional or nullable');
        });

        test('should reject fields that clash once lower-cased', () => {
            expect(() => describeRecord(z.object({ name: z.string(), Name: z.string() })))
                .toThrow('Invalid record field "Name": clashes with "name" once lower-cased');
        });

        test('should reject maps without string keys', () => {
            expect(() => describeRecord(z.object({ ports: z.record(z.number(), z.string()).optional() })))
                .toThrow('Invalid record field "ports": map fields must have string keys');
        });

        test('should reject nested links on optional objects', () => {
            expect(() => describeRecord(z.object(agentShape), { nested: { proxy: {} } }))
                .toThrow('Invalid record field "proxy": nested links are only allowed on required object fields');
        });

        test('should reject companions that are not boolean fields', () => {
            const schema = z.object({ image: z.string(), tag: z.string() });

            expect(() => describeRecord(schema, JSON.parse('{"inherited":{"image":"tag"}}')))
                .toThrow('Invalid record field "tag": inherited companion must be a boolean field');
        });

        test('should reject links to missing fields', () => {
            const schema = z.object({ image: z.string(), imageInherited: z.boolean() });

            expect(() => describeRecord(schema, JSON.parse('{"inherited":{"missing":"imageInherited"}}')))
                .toThrow('Invalid record field "missing": linked field does not exist');
        });

        test('should reject schemas that do not accept their zero value', () => {
            expect(() => describeRecord(z.object({ name: z.string().min(1) })))
                .toThrow(ValidationError);
            expect(() => describeRecord(z.object({ name: z.string().min(1) })))
                .toThrow(/^The zero value of the record does not match the record schema \(name: /);
        });
    });
});
