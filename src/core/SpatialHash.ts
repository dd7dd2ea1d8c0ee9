/**
 * Spatial hash grid for proximity queries on the XZ plane.
 * Buckets items by cell so a radius query only looks at nearby buckets.
 * Rebuilt every tick by the systems that use it.
 */

interface Entry<T> {
  x: number;
  z: number;
  item: T;
}

export class SpatialHash<T> {
  private readonly cellSize: number;
  private readonly cells = new Map<string, Entry<T>[]>();
  private count = 0;

  constructor(cellSize: number = 2) {
    if (!(cellSize > 0)) {
      throw new RangeError(`Spatial hash cell size must be positive, got ${cellSize}`);
    }
    this.cellSize = cellSize;
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.cells.clear();
    this.count = 0;
  }

  insert(x: number, z: number, item: T): void {
    const key = this.keyOf(Math.floor(x / this.cellSize), Math.floor(z / this.cellSize));
    let bucket = this.cells.get(key);
    if (!bucket) {
      bucket = [];
      this.cells.set(key, bucket);
    }
    bucket.push({ x, z, item });
    this.count++;
  }

  /** Items whose inserted point lies within `radius` of (x, z), nearest first. */
  queryRadius(x: number, z: number, radius: number): T[] {
    const hits: { item: T; distSq: number }[] = [];
    const reach = Math.ceil(radius / this.cellSize);
    const cellX = Math.floor(x / this.cellSize);
    const cellZ = Math.floor(z / this.cellSize);
    const radiusSq = radius * radius;

    for (let dx = -reach; dx <= reach; dx++) {
      for (let dz = -reach; dz <= reach; dz++) {
        const bucket = this.cells.get(this.keyOf(cellX + dx, cellZ + dz));
        if (!bucket) continue;
        for (const entry of bucket) {
          const ex = entry.x - x;
          const ez = entry.z - z;
          const distSq = ex * ex + ez * ez;
          if (distSq <= radiusSq) hits.push({ item: entry.item, distSq });
        }
      }
    }

    return hits.sort((a, b) => a.distSq - b.distSq).map((hit) => hit.item);
  }

  private keyOf(cellX: number, cellZ: number): string {
    return `${cellX},${cellZ}`;
  }
}
