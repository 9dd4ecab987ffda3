/**
 * Discourse Particle Registry
 *
 * Regional particle inventories with their expected phoneme sequences.
 * Every region also accepts the universal fillers unless it opts out.
 */

import { z } from 'zod';
import bundled from './discourse-particles.json';

const RegionSchema = z.object({
    label: z.string(),
    particles: z.record(z.array(z.string().min(1))),
    includeUniversal: z.boolean().default(true),
});

const RegistryFileSchema = z.object({
    universal: z.string(),
    regions: z.record(RegionSchema),
});

export interface ParticleForm {
    particle: string;
    phonemes: string[];
    region: string;
}

export interface RegionSummary {
    label: string;
    particles: string[];
}

export interface ParticleRegistryInstance {
    regions(): string[];
    has(region: string): boolean;
    /** Surface forms accepted for `region`, own particles first */
    particles(region: string): string[];
    forms(region: string): ParticleForm[];
    isParticle(region: string, surface: string): boolean;
    describe(): Record<string, RegionSummary>;
}

export const normalizePhoneme = (phoneme: string): string =>
    phoneme.replace(/[ːˈˌ]/g, '').toLowerCase();

export const normalizeSurface = (surface: string): string =>
    surface.trim().toLowerCase().replace(/^[^\p{L}]+|[^\p{L}]+$/gu, '');

export const create = (data: unknown = bundled): ParticleRegistryInstance => {
    const file = RegistryFileSchema.parse(data);
    const universal = file.regions[file.universal];

    const has = (region: string): boolean => Object.hasOwn(file.regions, region);

    const forms = (region: string): ParticleForm[] => {
        const entry = has(region) ? file.regions[region] : undefined;
        if (!entry) {
            return [];
        }
        const sources: Array<[string, Record<string, string[]>]> = [[region, entry.particles]];
        if (entry.includeUniversal && universal && region !== file.universal) {
            sources.push([file.universal, universal.particles]);
        }
        const result: ParticleForm[] = [];
        for (const [source, particles] of sources) {
            for (const [particle, variants] of Object.entries(particles)) {
                for (const variant of variants) {
                    result.push({
                        particle,
                        phonemes: variant.split(/\s+/).filter(p => p.length > 0).map(normalizePhoneme),
                        region: source,
                    });
                }
            }
        }
        return result;
    };

    const particles = (region: string): string[] => [...new Set(forms(region).map(form => form.particle))];

    const describe = (): Record<string, RegionSummary> => {
        const summary: Record<string, RegionSummary> = {};
        for (const [name, entry] of Object.entries(file.regions)) {
            summary[name] = { label: entry.label, particles: particles(name) };
        }
        return summary;
    };

    return {
        regions: () => Object.keys(file.regions),
        has,
        particles,
        forms,
        isParticle: (region, surface) => particles(region).includes(normalizeSurface(surface)),
        describe,
    };
};
