import type { Vector3 } from '../validation.js';

export interface ActorInfo {
  label: string;
  classPath: string;
  path: string;
  location: Vector3;
  /** Pitch, yaw, roll in degrees. */
  rotation: Vector3;
  scale: Vector3;
  boundsOrigin: Vector3;
  boundsExtent: Vector3;
  staticMeshPath?: string;
}

export interface AssetInfo {
  path: string;
  name: string;
  assetClass: string;
  /** Static meshes only. */
  meshStats?: {
    lodCount: number;
    vertexCount: number;
    triangleCount: number;
    boundsExtent: Vector3;
  };
}

export interface TransformChange {
  location?: Vector3;
  rotation?: Vector3;
  scale?: Vector3;
}

/**
 * Capabilities the embedding editor exposes to actions. Everything here is
 * owned by the host; the bridge keeps no scene state of its own.
 */
export interface EditorHost {
  getAllActors(): ActorInfo[];
  findActorByLabel(label: string): ActorInfo | undefined;
  getSelectedActors(): ActorInfo[];

  isClassLoadable(classPath: string): boolean;
  spawnActorFromClass(
    classPath: string,
    location: Vector3,
    rotation: Vector3,
  ): ActorInfo | null;
  spawnActorFromAsset(assetPath: string, location: Vector3): ActorInfo | null;
  destroyActor(label: string): boolean;
  setActorTransform(label: string, change: TransformChange): ActorInfo;
  duplicateActor(label: string, offset: Vector3): ActorInfo | null;

  selectAll(): void;
  invertSelection(): void;

  findAsset(assetPath: string): AssetInfo | undefined;
  listAssets(): AssetInfo[];

  log(message: string): void;
  getOutputLog(): string[];

  /**
   * Runs `fn` as one undoable editor transaction. Changes made by `fn` are
   * rolled back when it throws.
   */
  transaction<T>(description: string, fn: () => T): T;
}
