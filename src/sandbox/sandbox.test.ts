import { describe, expect, it } from 'vitest';
import { SandboxConfigError } from '../errors.ts';
import type { ParticleType } from '../types.ts';
import type { NoiseFieldGenerator } from './noise.ts';
import { Sandbox } from './sandbox.ts';

const flatNoise: NoiseFieldGenerator = (_x, _y, width, height) => new Float32Array(width * height);

describe('Sandbox', () => {
  it('uses the reference dimensions by default', () => {
    const sandbox = new Sandbox({ seed: 1 });
    expect(sandbox.width).toBe(600);
    expect(sandbox.height).toBe(400);
    expect(sandbox.countParticles()).toBe(0);
  });

  it('rejects invalid dimensions', () => {
    expect(() => new Sandbox({ width: 0 })).toThrow(SandboxConfigError);
  });

  it('places, erases and clears particles', () => {
    const sandbox = new Sandbox({ width: 10, height: 10, seed: 1 });
    sandbox.place(3, 4, 'Water');
    expect(sandbox.grid.get(3, 4)).toMatchObject({ type: 'Water', temperature: -10 });

    sandbox.erase(3, 4);
    expect(sandbox.grid.get(3, 4)).toBeNull();

    sandbox.paint(5, 5, 2, 'Sand');
    expect(sandbox.countParticles()).toBe(13);
    sandbox.clear();
    expect(sandbox.countParticles()).toBe(0);
  });

  it('keeps an empty grid empty and renders it uniform', () => {
    const sandbox = new Sandbox({ width: 6, height: 4, seed: 3 });
    const frame = new Uint8ClampedArray(6 * 4 * 4);

    sandbox.update();
    sandbox.render(frame, 0.25);

    expect(sandbox.countParticles()).toBe(0);
    for (let i = 0; i < frame.length; i += 4) {
      expect(Array.from(frame.subarray(i, i + 4))).toEqual([20, 20, 20, 255]);
    }
  });

  it('keeps sand on the bottom row in bounds', () => {
    const sandbox = new Sandbox({ width: 8, height: 6, seed: 5 });
    sandbox.place(0, 5, 'Sand');

    sandbox.update();

    expect(sandbox.grid.get(0, 5)?.type).toBe('Sand');
    expect(sandbox.countParticles()).toBe(1);
  });

  it('moves a falling grain one cell per step', () => {
    const sandbox = new Sandbox({ width: 1, height: 10, seed: 5 });
    sandbox.place(0, 0, 'Sand');

    sandbox.update();
    expect(sandbox.grid.get(0, 1)?.type).toBe('Sand');

    sandbox.update();
    expect(sandbox.grid.get(0, 2)?.type).toBe('Sand');
  });

  it('never loses or duplicates inert particles while they settle', () => {
    const sandbox = new Sandbox({ width: 20, height: 20, seed: 11 });
    const types: ParticleType[] = ['Sand', 'Glass', 'WetSand', 'Iridium'];
    for (let x = 0; x < 20; x++) {
      for (let y = 0; y < 10; y++) {
        if ((x * 7 + y * 3) % 5 === 0) continue;
        sandbox.place(x, y, types[(x + y) % types.length]);
      }
    }
    const before = sandbox.countParticles();

    for (let i = 0; i < 50; i++) sandbox.update();

    expect(sandbox.countParticles()).toBe(before);
  });

  it('renders through an injected noise field', () => {
    const sandbox = new Sandbox({ width: 2, height: 1, seed: 1 }, { noise: flatNoise });
    sandbox.place(1, 0, 'Iridium');
    const frame = new Uint8Array(8);

    sandbox.render(frame, 0);

    expect(Array.from(frame)).toEqual([20, 20, 20, 255, 205, 210, 211, 255]);
  });

  it('runs a mixed scene for many steps without breaking a contract', () => {
    const sandbox = new Sandbox({ width: 30, height: 30, seed: 2024 });
    const types: ParticleType[] = [
      'Sand', 'Water', 'Acid', 'Plant', 'Cryotheum', 'Unstable', 'Electricity', 'Glass', 'Replicator', 'Iridium',
    ];
    types.forEach((type, i) => sandbox.paint(3 + i * 3, 5, 1, type));
    const frame = new Uint8Array(30 * 30 * 4);

    expect(() => {
      for (let i = 0; i < 300; i++) sandbox.update();
      sandbox.render(frame, 1);
    }).not.toThrow();
  });
});
