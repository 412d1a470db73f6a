import { describe, expect, it } from 'vitest';
import { Grid } from '../sandbox/grid.ts';
import type { Particle, ParticleType, RandomSource } from '../types.ts';
import { createReactionStrategies } from './reactions.ts';

function particle(type: ParticleType, temperature = 0, extraData1 = 0, extraData2 = 0): Particle {
  return { type, temperature, extraData1, extraData2, lastUpdate: 0 };
}

function fixedRng(value: number): RandomSource {
  return { next: () => value, int: (min) => min };
}

describe('sand', () => {
  const { sand } = createReactionStrategies(fixedRng(0.5));

  it('soaks up neighbouring water and turns wet', () => {
    const grid = new Grid(3, 3);
    grid.set(1, 1, particle('Sand'));
    grid.set(2, 1, particle('Water'));

    sand(grid, 1, 1);

    expect(grid.get(1, 1)?.type).toBe('WetSand');
    expect(grid.get(2, 1)).toBeNull();
  });

  it('melts into glass at 100 degrees', () => {
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Sand', 100));

    sand(grid, 0, 0);

    expect(grid.get(0, 0)).toMatchObject({ type: 'Glass', temperature: 100 });
  });

  it('ignores diagonal water', () => {
    const grid = new Grid(2, 2);
    grid.set(0, 0, particle('Sand'));
    grid.set(1, 1, particle('Water'));

    sand(grid, 0, 0);

    expect(grid.get(0, 0)?.type).toBe('Sand');
    expect(grid.get(1, 1)?.type).toBe('Water');
  });
});

describe('water', () => {
  const { water } = createReactionStrategies(fixedRng(0.5));

  it('evaporates at the boiling point', () => {
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Water', 100));
    water(grid, 0, 0);
    expect(grid.get(0, 0)).toBeNull();
  });

  it('freezes into cryotheum', () => {
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Water', -50));
    water(grid, 0, 0);
    expect(grid.get(0, 0)?.type).toBe('Cryotheum');
  });

  it('stays water at its default temperature', () => {
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Water', -10));
    water(grid, 0, 0);
    expect(grid.get(0, 0)?.type).toBe('Water');
  });
});

describe('acid', () => {
  it('dissolves a neighbour and survives when the roll is high', () => {
    const { acid } = createReactionStrategies(fixedRng(0.9));
    const grid = new Grid(1, 2);
    grid.set(0, 0, particle('Acid'));
    grid.set(0, 1, particle('Sand'));

    acid(grid, 0, 0);

    expect(grid.get(0, 1)).toBeNull();
    expect(grid.get(0, 0)?.type).toBe('Acid');
  });

  it('is used up when the roll is low', () => {
    const { acid } = createReactionStrategies(fixedRng(0.1));
    const grid = new Grid(1, 2);
    grid.set(0, 0, particle('Acid'));
    grid.set(0, 1, particle('Sand'));

    acid(grid, 0, 0);

    expect(grid.countParticles()).toBe(0);
  });

  it('cannot touch iridium or other acid', () => {
    const { acid } = createReactionStrategies(fixedRng(0.1));
    const grid = new Grid(3, 1);
    grid.set(0, 0, particle('Iridium'));
    grid.set(1, 0, particle('Acid'));
    grid.set(2, 0, particle('Acid'));

    acid(grid, 1, 0);

    expect(grid.countParticles()).toBe(3);
  });

  it('dissolves one neighbour per step, checking below first', () => {
    const { acid } = createReactionStrategies(fixedRng(0.9));
    const grid = new Grid(3, 3);
    grid.set(1, 1, particle('Acid'));
    grid.set(1, 2, particle('Sand'));
    grid.set(2, 1, particle('Glass'));

    acid(grid, 1, 1);

    expect(grid.get(1, 2)).toBeNull();
    expect(grid.get(2, 1)?.type).toBe('Glass');
  });
});

describe('replicator', () => {
  const { replicator } = createReactionStrategies(fixedRng(0.5));

  it('copies a neighbour into the opposite empty cell', () => {
    const grid = new Grid(3, 3);
    grid.set(1, 0, particle('Sand', 12));
    grid.set(1, 1, particle('Replicator'));

    replicator(grid, 1, 1);

    expect(grid.get(1, 2)).toEqual(particle('Sand', 12));
    expect(grid.get(1, 2)).not.toBe(grid.get(1, 0));
  });

  it('does not copy replicators or overwrite occupied cells', () => {
    const grid = new Grid(3, 3);
    grid.set(0, 1, particle('Replicator'));
    grid.set(1, 1, particle('Replicator'));
    grid.set(1, 0, particle('Sand'));
    grid.set(1, 2, particle('Iridium'));

    replicator(grid, 1, 1);

    expect(grid.get(2, 1)).toBeNull();
    expect(grid.get(1, 2)?.type).toBe('Iridium');
    expect(grid.get(1, 0)?.type).toBe('Sand');
  });
});

describe('plant', () => {
  it('roots a seed resting on wet sand', () => {
    const { plant } = createReactionStrategies(fixedRng(0.5));
    const grid = new Grid(1, 2);
    grid.set(0, 0, particle('Plant', 0, 6, 0));
    grid.set(0, 1, particle('WetSand'));

    plant(grid, 0, 0);

    expect(grid.get(0, 0)?.extraData2).toBe(1);
  });

  it('keeps a seed on dry sand loose', () => {
    const { plant } = createReactionStrategies(fixedRng(0.5));
    const grid = new Grid(1, 2);
    grid.set(0, 0, particle('Plant', 0, 6, 0));
    grid.set(0, 1, particle('Sand'));

    plant(grid, 0, 0);

    expect(grid.get(0, 0)?.extraData2).toBe(0);
  });

  it('grows a new tip upward and becomes stem', () => {
    const { plant } = createReactionStrategies(fixedRng(0));
    const grid = new Grid(1, 3);
    grid.set(0, 2, particle('Plant', 4, 6, 1));

    plant(grid, 0, 2);

    expect(grid.get(0, 1)).toEqual(particle('Plant', 4, 5, 1));
    expect(grid.get(0, 2)?.extraData1).toBe(0);
  });

  it('stops growing below growth 2', () => {
    const { plant } = createReactionStrategies(fixedRng(0));
    const grid = new Grid(1, 2);
    grid.set(0, 1, particle('Plant', 0, 1, 1));

    plant(grid, 0, 1);

    expect(grid.get(0, 0)).toBeNull();
  });

  it('waits when the growth roll fails', () => {
    const { plant } = createReactionStrategies(fixedRng(0.5));
    const grid = new Grid(1, 2);
    grid.set(0, 1, particle('Plant', 0, 6, 1));

    plant(grid, 0, 1);

    expect(grid.get(0, 0)).toBeNull();
  });

  it('burns away when hot', () => {
    const { plant } = createReactionStrategies(fixedRng(0));
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Plant', 80, 6, 1));

    plant(grid, 0, 0);

    expect(grid.get(0, 0)).toBeNull();
  });
});

describe('cryotheum', () => {
  const { cryotheum } = createReactionStrategies(fixedRng(0.5));

  it('melts into water at 0 degrees', () => {
    const grid = new Grid(1, 2);
    grid.set(0, 0, particle('Cryotheum', 0));
    grid.set(0, 1, particle('Cryotheum', -1));

    cryotheum(grid, 0, 0);
    cryotheum(grid, 0, 1);

    expect(grid.get(0, 0)).toMatchObject({ type: 'Water', temperature: 0 });
    expect(grid.get(0, 1)?.type).toBe('Cryotheum');
  });
});

describe('unstable', () => {
  const { unstable } = createReactionStrategies(fixedRng(0.5));

  it('warms by one degree per step', () => {
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Unstable', 10));
    unstable(grid, 0, 0);
    expect(grid.get(0, 0)?.temperature).toBe(11);
  });

  it('explodes at 200 degrees', () => {
    const grid = new Grid(20, 20);
    grid.set(10, 10, particle('Unstable', 199));
    grid.set(10, 12, particle('Sand'));
    grid.set(11, 10, particle('Iridium'));
    grid.set(10, 18, particle('Sand'));
    grid.set(0, 0, particle('Sand'));

    unstable(grid, 10, 10);

    expect(grid.get(10, 10)).toBeNull();
    expect(grid.get(10, 12)).toBeNull();
    expect(grid.get(11, 10)).toMatchObject({ type: 'Iridium', temperature: 100 });
    expect(grid.get(10, 18)).toMatchObject({ type: 'Sand', temperature: 100 });
    expect(grid.get(0, 0)).toMatchObject({ type: 'Sand', temperature: 0 });
  });

  it('honours tuning overrides', () => {
    const { unstable: fast } = createReactionStrategies(fixedRng(0.5), { unstableWarmRate: 5 });
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Unstable', 0));
    fast(grid, 0, 0);
    expect(grid.get(0, 0)?.temperature).toBe(5);
  });
});

describe('electricity', () => {
  const { electricity } = createReactionStrategies(fixedRng(0.5));

  it('ages and fades out after its lifetime', () => {
    const grid = new Grid(1, 1);
    grid.set(0, 0, particle('Electricity', 0, 6));

    electricity(grid, 0, 0);
    expect(grid.get(0, 0)?.extraData1).toBe(7);

    electricity(grid, 0, 0);
    expect(grid.get(0, 0)).toBeNull();
  });

  it('heats what it touches and discharges', () => {
    const grid = new Grid(1, 2);
    grid.set(0, 0, particle('Electricity'));
    grid.set(0, 1, particle('Unstable', 10));

    electricity(grid, 0, 0);

    expect(grid.get(0, 0)).toBeNull();
    expect(grid.get(0, 1)?.temperature).toBe(25);
  });

  it('passes other sparks by', () => {
    const grid = new Grid(2, 1);
    grid.set(0, 0, particle('Electricity'));
    grid.set(1, 0, particle('Electricity'));

    electricity(grid, 0, 0);

    expect(grid.get(0, 0)?.extraData1).toBe(1);
    expect(grid.get(1, 0)?.temperature).toBe(0);
  });
});
