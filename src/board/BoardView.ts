import * as THREE from 'three';
import type { Position } from '../puzzle/types';
import { BLANK } from '../puzzle/types';
import type { PuzzleView } from '../game/PuzzleState';

export interface BoardViewOptions {
  cellSize?: number;
  gap?: number;        // space between neighbouring tiles
  tileDepth?: number;
}

export const TILE_COLOR = 0xe0e0e0;
export const MOVABLE_COLOR = 0xbbdefb;

type TileMesh = THREE.Mesh<THREE.BoxGeometry, THREE.MeshStandardMaterial>;

// Scene-graph model of the board: one box per tile on the XY plane,
// centred on the origin with row 0 at the top.
export class BoardView {
  readonly group: THREE.Group;
  readonly cellSize: number;
  readonly gap: number;
  readonly tileDepth: number;

  private boardSize = 0;
  private geometry: THREE.BoxGeometry | null = null;
  private tiles: Map<number, TileMesh> = new Map();
  private tileCells: Map<number, Position> = new Map();
  private meshValues: Map<THREE.Object3D, number> = new Map();

  constructor(options: BoardViewOptions = {}) {
    this.cellSize = options.cellSize ?? 1;
    this.gap = options.gap ?? 0.05;
    this.tileDepth = options.tileDepth ?? 0.2;
    this.group = new THREE.Group();
    this.group.name = 'board';
  }

  get size(): number {
    return this.boardSize;
  }

  // ============= Coordinates =============

  // Centre of a cell in world space
  cellToWorld(row: number, col: number): THREE.Vector3 {
    return new THREE.Vector3(
      (col - this.boardSize / 2 + 0.5) * this.cellSize,
      (this.boardSize / 2 - row - 0.5) * this.cellSize,
      0
    );
  }

  worldToCell(worldPos: THREE.Vector3): Position | null {
    const col = Math.floor(worldPos.x / this.cellSize + this.boardSize / 2);
    const row = Math.floor(this.boardSize / 2 - worldPos.y / this.cellSize);
    if (row < 0 || row >= this.boardSize || col < 0 || col >= this.boardSize) return null;
    return { row, col };
  }

  // ============= Sync =============

  sync(state: PuzzleView): void {
    if (state.size !== this.boardSize) {
      this.rebuild(state.size);
    }

    const movable = new Set(state.movableCells().map(p => `${p.row},${p.col}`));
    this.tileCells.clear();

    for (let row = 0; row < state.size; row++) {
      for (let col = 0; col < state.size; col++) {
        const value = state.board[row][col];
        if (value === BLANK) continue;

        const mesh = this.tiles.get(value);
        if (!mesh) continue;

        mesh.position.copy(this.cellToWorld(row, col));
        mesh.material.color.setHex(movable.has(`${row},${col}`) ? MOVABLE_COLOR : TILE_COLOR);
        this.tileCells.set(value, { row, col });
      }
    }

    this.group.updateMatrixWorld(true);
  }

  getTileMesh(value: number): TileMesh | null {
    return this.tiles.get(value) ?? null;
  }

  // ============= Picking =============

  // Cell of the nearest tile hit by the ray
  pick(raycaster: THREE.Raycaster): Position | null {
    const hits = raycaster.intersectObjects([...this.tiles.values()], false);
    for (const hit of hits) {
      const value = this.meshValues.get(hit.object);
      if (value === undefined) continue;
      const cell = this.tileCells.get(value);
      if (cell) return { ...cell };
    }
    return null;
  }

  // Cell under the ray on the board plane, blank included
  pickOnPlane(raycaster: THREE.Raycaster): Position | null {
    const plane = new THREE.Plane(new THREE.Vector3(0, 0, 1), 0);
    const intersection = new THREE.Vector3();
    if (!raycaster.ray.intersectPlane(plane, intersection)) return null;
    return this.worldToCell(intersection);
  }

  dispose(): void {
    for (const mesh of this.tiles.values()) {
      this.group.remove(mesh);
      mesh.material.dispose();
    }
    this.geometry?.dispose();
    this.geometry = null;
    this.tiles.clear();
    this.tileCells.clear();
    this.meshValues.clear();
    this.boardSize = 0;
  }

  // ============= Internals =============

  private rebuild(size: number): void {
    this.dispose();
    this.boardSize = size;

    const tileSize = this.cellSize - this.gap;
    this.geometry = new THREE.BoxGeometry(tileSize, tileSize, this.tileDepth);

    for (let value = 1; value < size * size; value++) {
      const material = new THREE.MeshStandardMaterial({ color: TILE_COLOR });
      const mesh = new THREE.Mesh(this.geometry, material);
      mesh.name = `tile-${value}`;
      this.tiles.set(value, mesh);
      this.meshValues.set(mesh, value);
      this.group.add(mesh);
    }
  }
}
