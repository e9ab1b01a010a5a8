import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ValidationError } from '../src/errors';
import { cellIntersectsRing, containsPoint, outerRing, parsePolygon, ringBounds } from '../src/raster/geometry';
import { SQUARE } from './helpers/fixtures';

test('accepts a closed single-ring polygon and drops altitude', () => {
  const polygon = parsePolygon({
    type: 'Polygon',
    coordinates: [
      [
        [0, 0, 5],
        [1, 0, 5],
        [1, 1, 5],
        [0, 0, 5]
      ]
    ]
  });
  assert.deepEqual(polygon.coordinates[0], [
    [0, 0],
    [1, 0],
    [1, 1],
    [0, 0]
  ]);
});

test('rejects polygons that are open, holed or out of range', () => {
  const invalid = [
    { type: 'Point', coordinates: [0, 0] },
    { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1]]] },
    { type: 'Polygon', coordinates: [SQUARE.coordinates[0], SQUARE.coordinates[0]] },
    { type: 'Polygon', coordinates: [[[0, 0], [1, 95], [1, 1], [0, 0]]] },
    { type: 'Polygon', coordinates: [[[0, 0], [1, 1], [0, 0]]] }
  ];
  for (const candidate of invalid) {
    assert.throws(
      () => parsePolygon(candidate),
      (err: unknown) => err instanceof ValidationError && err.code === 'INVALID_GEOMETRY'
    );
  }
});

test('tests points against the outer ring', () => {
  const ring = outerRing(SQUARE);
  assert.equal(containsPoint(ring, 10.5, 10.5), true);
  assert.equal(containsPoint(ring, 11.5, 10.5), false);
  assert.equal(containsPoint(ring, 10.5, 9.5), false);
});

test('computes ring bounds', () => {
  assert.deepEqual(ringBounds(outerRing(SQUARE)), { minx: 10, miny: 10, maxx: 11, maxy: 11 });
});

test('counts cells the polygon overlaps but not cells it only borders', () => {
  const ring = outerRing(SQUARE);
  assert.equal(cellIntersectsRing(ring, { minx: 10.9, miny: 10.9, maxx: 11.1, maxy: 11.1 }), true);
  assert.equal(cellIntersectsRing(ring, { minx: 11, miny: 10, maxx: 11.25, maxy: 10.25 }), false);
  assert.equal(cellIntersectsRing(ring, { minx: 11, miny: 11, maxx: 11.25, maxy: 11.25 }), false);
  assert.equal(cellIntersectsRing(ring, { minx: 12, miny: 12, maxx: 12.25, maxy: 12.25 }), false);
});

test('counts a cell that fully contains a small polygon', () => {
  const triangle: [number, number][] = [
    [10.01, 10.99],
    [10.05, 10.99],
    [10.01, 10.95],
    [10.01, 10.99]
  ];
  assert.equal(cellIntersectsRing(triangle, { minx: 10, miny: 10.75, maxx: 10.25, maxy: 11 }), true);
  assert.equal(cellIntersectsRing(triangle, { minx: 10.25, miny: 10.75, maxx: 10.5, maxy: 11 }), false);
});
