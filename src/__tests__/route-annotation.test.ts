/**
 * =============================================================================
 * ROUTE ANNOTATION - Unit Tests
 * =============================================================================
 */

import {
  annotateSteps,
  blockedRoadsFor,
  describeManeuver,
} from '../modules/routing/route-annotation.helper';
import { RawRouteStep } from '../modules/routing/routing.schema';

function step(name: string | undefined, type: string, modifier?: string): RawRouteStep {
  return {
    distance: 500,
    duration: 60,
    name,
    maneuver: modifier ? { type, modifier } : { type },
  };
}

describe('annotateSteps', () => {
  it('flags a road listed for the disaster type and offers the service lane', () => {
    const [annotated] = annotateSteps([step('Main Street', 'turn', 'left')], 'Flood');

    expect(annotated).toEqual({
      instruction: 'Turn left onto Main Street',
      distanceMeters: 500,
      durationSeconds: 60,
      roadName: 'Main Street',
      blocked: true,
      alternative: 'Use Service Lane',
    });
  });

  it('leaves other roads clear', () => {
    const [annotated] = annotateSteps([step('Park Avenue', 'turn', 'right')], 'Flood');

    expect(annotated.blocked).toBe(false);
    expect(annotated.alternative).toBeNull();
  });

  it('matches the disaster type case-insensitively', () => {
    const steps = [step('Forest Highway', 'continue')];

    expect(annotateSteps(steps, 'FIRE')[0].blocked).toBe(true);
    expect(annotateSteps(steps, 'fire')[0].blocked).toBe(true);
    expect(annotateSteps(steps, 'Fire')[0].blocked).toBe(true);
  });

  it('matches road names case-sensitively', () => {
    expect(annotateSteps([step('main street', 'continue')], 'Flood')[0].blocked).toBe(false);
  });

  it('blocks nothing for a type without table entries', () => {
    const steps = [step('Main Street', 'depart'), step('Tunnel Road', 'turn', 'left')];

    expect(annotateSteps(steps, 'Tsunami').map(s => s.blocked)).toEqual([false, false]);
    expect(annotateSteps(steps, 'Other').map(s => s.blocked)).toEqual([false, false]);
  });

  it('names missing or empty roads "Unnamed Road"', () => {
    const annotated = annotateSteps([step(undefined, 'depart'), step('', 'turn', 'left')], 'Earthquake');

    expect(annotated.map(s => s.roadName)).toEqual(['Unnamed Road', 'Unnamed Road']);
    expect(annotated[0].instruction).toBe('Head out on Unnamed Road');
  });

  it('prefers the instruction text OSRM sends', () => {
    const raw: RawRouteStep = {
      distance: 120,
      duration: 14,
      name: 'Bridge Approach',
      maneuver: { type: 'turn', modifier: 'right', instruction: 'Turn right at the fuel station' },
    };

    const [annotated] = annotateSteps([raw], 'Earthquake');

    expect(annotated.instruction).toBe('Turn right at the fuel station');
    expect(annotated.blocked).toBe(true);
  });

  it('keeps step order and sets alternative exactly when blocked', () => {
    const annotated = annotateSteps([
      step('Ring Road', 'depart'),
      step('River Road', 'turn', 'left'),
      step('Main Street', 'continue'),
      step('Hill View', 'arrive'),
    ], 'flood');

    expect(annotated.map(s => s.roadName)).toEqual(['Ring Road', 'River Road', 'Main Street', 'Hill View']);
    for (const s of annotated) {
      expect(s.alternative !== null).toBe(s.blocked);
    }
  });
});

describe('blockedRoadsFor', () => {
  it('returns the configured roads', () => {
    expect([...blockedRoadsFor('Earthquake')]).toEqual(['Bridge Approach', 'Tunnel Road']);
  });

  it('ignores object prototype keys', () => {
    expect(blockedRoadsFor('constructor').size).toBe(0);
    expect(blockedRoadsFor('__proto__').size).toBe(0);
  });
});

describe('describeManeuver', () => {
  it.each([
    [{ type: 'depart' }, 'Head out on Oak Lane'],
    [{ type: 'arrive' }, 'Arrive at your destination'],
    [{ type: 'new name', modifier: 'straight' }, 'Continue straight onto Oak Lane'],
    [{ type: 'continue' }, 'Continue onto Oak Lane'],
    [{ type: 'roundabout', modifier: 'right' }, 'Enter the roundabout and exit onto Oak Lane'],
    [{ type: 'rotary' }, 'Enter the roundabout and exit onto Oak Lane'],
    [{ type: 'merge', modifier: 'slight left' }, 'Merge slight left onto Oak Lane'],
    [{ type: 'fork' }, 'Fork onto Oak Lane'],
  ])('%o → %s', (maneuver, expected) => {
    expect(describeManeuver(maneuver, 'Oak Lane')).toBe(expected);
  });
});
