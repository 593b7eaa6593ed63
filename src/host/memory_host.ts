import type { Vector3 } from '../validation.js';
import type {
  ActorInfo,
  AssetInfo,
  EditorHost,
  TransformChange,
} from './types.js';

export class HostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HostError';
  }
}

export interface MemoryEditorHostOptions {
  levelPath?: string;
  classes?: string[];
  assets?: AssetInfo[];
  /** Mirrors host log lines to a sink (the console, in the bridge host). */
  onLog?: (line: string) => void;
}

const DEFAULT_CLASSES = [
  '/Script/Engine.StaticMeshActor',
  '/Script/Engine.PointLight',
  '/Script/Engine.DirectionalLight',
  '/Script/Engine.CameraActor',
  '/Script/Engine.PlayerStart',
];

const DEFAULT_EXTENT: Vector3 = [50, 50, 50];

const DEFAULT_ASSETS: AssetInfo[] = [
  {
    path: '/Game/Meshes/SM_Cube.SM_Cube',
    name: 'SM_Cube',
    assetClass: 'StaticMesh',
    meshStats: {
      lodCount: 1,
      vertexCount: 24,
      triangleCount: 12,
      boundsExtent: [50, 50, 50],
    },
  },
  {
    path: '/Game/Meshes/SM_Sphere.SM_Sphere',
    name: 'SM_Sphere',
    assetClass: 'StaticMesh',
    meshStats: {
      lodCount: 3,
      vertexCount: 482,
      triangleCount: 960,
      boundsExtent: [50, 50, 50],
    },
  },
  {
    path: '/Game/Materials/M_Basic.M_Basic',
    name: 'M_Basic',
    assetClass: 'Material',
  },
];

interface HostState {
  actors: ActorInfo[];
  selection: string[];
  labelCounters: Map<string, number>;
}

function cloneActor(actor: ActorInfo): ActorInfo {
  return {
    ...actor,
    location: [...actor.location],
    rotation: [...actor.rotation],
    scale: [...actor.scale],
    boundsOrigin: [...actor.boundsOrigin],
    boundsExtent: [...actor.boundsExtent],
  };
}

function addVectors(a: Vector3, b: Vector3): Vector3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

function scaleExtent(extent: Vector3, scale: Vector3): Vector3 {
  return [
    extent[0] * Math.abs(scale[0]),
    extent[1] * Math.abs(scale[1]),
    extent[2] * Math.abs(scale[2]),
  ];
}

/** '/Script/Engine.StaticMeshActor' -> 'StaticMeshActor', 'BP_Door_C' -> 'BP_Door'. */
export function labelBaseForClass(classPath: string): string {
  const lastSegment = classPath.split('/').pop() ?? classPath;
  const objectName = lastSegment.includes('.')
    ? lastSegment.slice(lastSegment.lastIndexOf('.') + 1)
    : lastSegment;
  return objectName.endsWith('_C') ? objectName.slice(0, -2) : objectName;
}

/**
 * Editor host kept entirely in memory. Used by the standalone bridge host
 * and by tests; a real embedding supplies its own EditorHost.
 */
export class MemoryEditorHost implements EditorHost {
  private readonly levelPath: string;
  private readonly classes: Set<string>;
  private readonly assets: Map<string, AssetInfo>;
  private readonly onLog?: (line: string) => void;

  private state: HostState = {
    actors: [],
    selection: [],
    labelCounters: new Map(),
  };
  private outputLog: string[] = [];
  private transactionDepth = 0;
  private readonly history: string[] = [];

  constructor(options: MemoryEditorHostOptions = {}) {
    this.levelPath = options.levelPath ?? '/Game/Maps/Untitled.Untitled';
    this.classes = new Set(options.classes ?? DEFAULT_CLASSES);
    this.assets = new Map(
      (options.assets ?? DEFAULT_ASSETS).map((asset) => [asset.path, asset]),
    );
    this.onLog = options.onLog;
  }

  /** Descriptions of committed transactions, oldest first. */
  get transactionHistory(): string[] {
    return [...this.history];
  }

  getAllActors(): ActorInfo[] {
    return this.state.actors.map(cloneActor);
  }

  findActorByLabel(label: string): ActorInfo | undefined {
    const actor = this.state.actors.find((a) => a.label === label);
    return actor ? cloneActor(actor) : undefined;
  }

  getSelectedActors(): ActorInfo[] {
    const selected = new Set(this.state.selection);
    return this.state.actors
      .filter((a) => selected.has(a.label))
      .map(cloneActor);
  }

  isClassLoadable(classPath: string): boolean {
    return this.classes.has(classPath);
  }

  spawnActorFromClass(
    classPath: string,
    location: Vector3,
    rotation: Vector3,
  ): ActorInfo | null {
    if (!this.isClassLoadable(classPath)) return null;
    return this.addActor({
      base: labelBaseForClass(classPath),
      classPath,
      location,
      rotation,
      extent: DEFAULT_EXTENT,
    });
  }

  spawnActorFromAsset(assetPath: string, location: Vector3): ActorInfo | null {
    const asset = this.assets.get(assetPath);
    if (!asset || asset.assetClass !== 'StaticMesh') return null;
    return this.addActor({
      base: asset.name,
      classPath: '/Script/Engine.StaticMeshActor',
      location,
      rotation: [0, 0, 0],
      extent: asset.meshStats?.boundsExtent ?? DEFAULT_EXTENT,
      staticMeshPath: asset.path,
    });
  }

  destroyActor(label: string): boolean {
    const index = this.state.actors.findIndex((a) => a.label === label);
    if (index === -1) return false;
    this.state.actors.splice(index, 1);
    this.state.selection = this.state.selection.filter((l) => l !== label);
    return true;
  }

  setActorTransform(label: string, change: TransformChange): ActorInfo {
    const actor = this.state.actors.find((a) => a.label === label);
    if (!actor) throw new HostError(`Actor not found: ${label}`);

    const baseExtent: Vector3 = [
      actor.boundsExtent[0] / Math.abs(actor.scale[0] || 1),
      actor.boundsExtent[1] / Math.abs(actor.scale[1] || 1),
      actor.boundsExtent[2] / Math.abs(actor.scale[2] || 1),
    ];

    if (change.location) {
      actor.location = [...change.location];
      actor.boundsOrigin = [...change.location];
    }
    if (change.rotation) actor.rotation = [...change.rotation];
    if (change.scale) {
      actor.scale = [...change.scale];
      actor.boundsExtent = scaleExtent(baseExtent, change.scale);
    }
    return cloneActor(actor);
  }

  duplicateActor(label: string, offset: Vector3): ActorInfo | null {
    const source = this.state.actors.find((a) => a.label === label);
    if (!source) return null;
    return this.addActor({
      base: labelBaseForClass(source.staticMeshPath ?? source.classPath),
      classPath: source.classPath,
      location: addVectors(source.location, offset),
      rotation: source.rotation,
      scale: source.scale,
      extent: source.boundsExtent,
      staticMeshPath: source.staticMeshPath,
    });
  }

  selectAll(): void {
    this.state.selection = this.state.actors.map((a) => a.label);
  }

  invertSelection(): void {
    const selected = new Set(this.state.selection);
    this.state.selection = this.state.actors
      .map((a) => a.label)
      .filter((label) => !selected.has(label));
  }

  findAsset(assetPath: string): AssetInfo | undefined {
    return this.assets.get(assetPath);
  }

  listAssets(): AssetInfo[] {
    return [...this.assets.values()];
  }

  log(message: string): void {
    const line = `LogBridge: ${message}`;
    this.outputLog.push(line);
    this.onLog?.(line);
  }

  getOutputLog(): string[] {
    return [...this.outputLog];
  }

  transaction<T>(description: string, fn: () => T): T {
    if (this.transactionDepth > 0) {
      this.transactionDepth += 1;
      try {
        return fn();
      } finally {
        this.transactionDepth -= 1;
      }
    }

    const snapshot: HostState = {
      actors: this.state.actors.map(cloneActor),
      selection: [...this.state.selection],
      labelCounters: new Map(this.state.labelCounters),
    };

    this.transactionDepth = 1;
    try {
      const result = fn();
      this.history.push(description);
      return result;
    } catch (error) {
      this.state = snapshot;
      throw error;
    } finally {
      this.transactionDepth = 0;
    }
  }

  private nextLabel(base: string): string {
    let n = this.state.labelCounters.get(base) ?? 0;
    let label: string;
    do {
      n += 1;
      label = `${base}_${n}`;
    } while (this.state.actors.some((a) => a.label === label));
    this.state.labelCounters.set(base, n);
    return label;
  }

  private addActor(init: {
    base: string;
    classPath: string;
    location: Vector3;
    rotation: Vector3;
    scale?: Vector3;
    extent: Vector3;
    staticMeshPath?: string;
  }): ActorInfo {
    const label = this.nextLabel(init.base);
    const actor: ActorInfo = {
      label,
      classPath: init.classPath,
      path: `${this.levelPath}:PersistentLevel.${label}`,
      location: [...init.location],
      rotation: [...init.rotation],
      scale: init.scale ? [...init.scale] : [1, 1, 1],
      boundsOrigin: [...init.location],
      boundsExtent: [...init.extent],
      ...(init.staticMeshPath ? { staticMeshPath: init.staticMeshPath } : {}),
    };
    this.state.actors.push(actor);
    return cloneActor(actor);
  }
}
