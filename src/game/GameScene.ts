import * as THREE from "three";
import { createLogger, LogCategory } from "@/lib/logging";
import type { InputManager } from "@/engine";
import type { GameState, GameStateData } from "./GameState";
import {
  BLANK,
  type Direction,
  type Position,
  type ReadonlyGrid,
} from "./systems/GridSystem";
import { movableTiles, tileForSlide } from "./systems/MoveSystem";

const TILE_SIZE = 1;
const TILE_GAP = 0.08;

const TILE_COLOR = "#1f6feb";
const MOVABLE_COLOR = "#3fb950";
const PAUSED_COLOR = "#30363d";

const KEY_DIRECTIONS: Record<string, Direction> = {
  ArrowUp: "up",
  ArrowDown: "down",
  ArrowLeft: "left",
  ArrowRight: "right",
  KeyW: "up",
  KeyS: "down",
  KeyA: "left",
  KeyD: "right",
};

const logger = createLogger(LogCategory.RENDERING);

type TileCell = Position;

const isTileCell = (value: unknown): value is TileCell =>
  typeof value === "object" &&
  value !== null &&
  "row" in value &&
  "col" in value &&
  typeof value.row === "number" &&
  typeof value.col === "number";

export class GameScene {
  readonly scene = new THREE.Scene();
  readonly camera = new THREE.OrthographicCamera(-1, 1, 1, -1, 0.1, 100);

  private readonly tilesGroup = new THREE.Group();
  private readonly raycaster = new THREE.Raycaster();
  private readonly pointerNdc = new THREE.Vector2();
  private unsubscribe: (() => void) | null = null;

  private boardSignature = "";
  private size = 0;

  constructor(private readonly gameState: GameState) {
    this.scene.add(this.tilesGroup);
    this.camera.position.set(0, 0, 10);
    this.scene.background = new THREE.Color(0x0f1115);

    this.unsubscribe = this.gameState.subscribe((state) => {
      const signature = `${state.status}|${state.grid.flat().join(",")}`;
      if (signature !== this.boardSignature || state.size !== this.size) {
        this.boardSignature = signature;
        this.size = state.size;
        this.rebuildGrid(state);
      }
    });
  }

  dispose() {
    this.unsubscribe?.();
    this.disposeTiles();
  }

  resize(width: number, height: number) {
    const aspect = width / height || 1;
    const boardSize =
      this.size > 0
        ? this.size * TILE_SIZE + (this.size - 1) * TILE_GAP
        : 2;
    const padding = 0.35;
    const halfBoard = boardSize / 2 + padding;

    if (aspect >= 1) {
      this.camera.top = halfBoard;
      this.camera.bottom = -halfBoard;
      this.camera.left = -halfBoard * aspect;
      this.camera.right = halfBoard * aspect;
    } else {
      this.camera.left = -halfBoard;
      this.camera.right = halfBoard;
      this.camera.top = halfBoard / aspect;
      this.camera.bottom = -halfBoard / aspect;
    }

    this.camera.updateProjectionMatrix();
  }

  update(input: InputManager, renderer: THREE.WebGLRenderer) {
    for (const code of input.consumeKeyPresses()) {
      const direction = KEY_DIRECTIONS[code];
      if (!direction) continue;
      const { row, col } = tileForSlide(this.gameState.getState().blank, direction);
      this.gameState.move(row, col);
    }

    const pointer = input.getPointer();
    if (!pointer.justPressed) return;

    const rect = renderer.domElement.getBoundingClientRect();
    this.pointerNdc.x = ((pointer.x - rect.left) / rect.width) * 2 - 1;
    this.pointerNdc.y = -((pointer.y - rect.top) / rect.height) * 2 + 1;
    this.raycaster.setFromCamera(this.pointerNdc, this.camera);

    const intersections = this.raycaster.intersectObjects(
      this.tilesGroup.children,
      false
    );
    if (intersections.length === 0) return;

    const cell = intersections[0].object.userData;
    if (!isTileCell(cell)) {
      logger.warn("Picked an object without tile coordinates");
      return;
    }
    this.gameState.move(cell.row, cell.col);
  }

  render(renderer: THREE.WebGLRenderer) {
    renderer.render(this.scene, this.camera);
  }

  private rebuildGrid(state: GameStateData) {
    this.disposeTiles();
    const grid: ReadonlyGrid = state.grid;
    const size = grid.length;
    const boardSize = size * TILE_SIZE + (size - 1) * TILE_GAP;
    const offset = boardSize / 2 - TILE_SIZE / 2;
    const movable = new Set(
      movableTiles(grid, state.blank).map(({ row, col }) => `${row},${col}`)
    );

    grid.forEach((row, rowIndex) => {
      row.forEach((value, colIndex) => {
        if (value === BLANK) return;
        const color =
          state.status === "paused"
            ? PAUSED_COLOR
            : state.status === "playing" && movable.has(`${rowIndex},${colIndex}`)
              ? MOVABLE_COLOR
              : TILE_COLOR;
        const texture = createTileTexture(value, color);
        const material = new THREE.MeshBasicMaterial({ map: texture });
        const geometry = new THREE.PlaneGeometry(TILE_SIZE, TILE_SIZE);
        const mesh = new THREE.Mesh(geometry, material);
        mesh.position.set(
          colIndex * (TILE_SIZE + TILE_GAP) - offset,
          -(rowIndex * (TILE_SIZE + TILE_GAP) - offset),
          0
        );
        mesh.userData = { row: rowIndex, col: colIndex };
        this.tilesGroup.add(mesh);
      });
    });
  }

  private disposeTiles() {
    this.tilesGroup.children.forEach((child) => {
      if (!(child instanceof THREE.Mesh)) return;
      const material: unknown = child.material;
      if (material instanceof THREE.MeshBasicMaterial) {
        material.map?.dispose();
        material.dispose();
      }
      child.geometry.dispose();
    });
    this.tilesGroup.clear();
  }
}

const createTileTexture = (value: number, color: string) => {
  const size = 256;
  const canvas = document.createElement("canvas");
  canvas.width = size;
  canvas.height = size;
  const ctx = canvas.getContext("2d");
  if (ctx) {
    ctx.fillStyle = color;
    ctx.fillRect(0, 0, size, size);
    ctx.strokeStyle = "#ffffff";
    ctx.lineWidth = 10;
    ctx.strokeRect(8, 8, size - 16, size - 16);
    ctx.fillStyle = "#ffffff";
    ctx.font = "bold 120px sans-serif";
    ctx.textAlign = "center";
    ctx.textBaseline = "middle";
    ctx.fillText(String(value), size / 2, size / 2);
  }

  const texture = new THREE.CanvasTexture(canvas);
  texture.needsUpdate = true;
  return texture;
};
