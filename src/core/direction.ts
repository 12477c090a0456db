import type { Direction, Vec2 } from './types';

export const DIRECTION_VECTORS: Record<Direction, Vec2> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

// Clockwise from north; the next-step field breaks ties in this order.
export const DIRECTIONS: readonly Direction[] = ['up', 'right', 'down', 'left'];

export function isDirection(value: string): value is Direction {
  return value === 'up' || value === 'down' || value === 'left' || value === 'right';
}

export function offset(position: Vec2, direction: Direction): Vec2 {
  const vector = DIRECTION_VECTORS[direction];
  return { x: position.x + vector.x, y: position.y + vector.y };
}

export function isAdjacent(a: Vec2, b: Vec2): boolean {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y) === 1;
}

export function samePosition(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}
