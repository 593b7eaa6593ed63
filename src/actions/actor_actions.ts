import {
  asNonEmptyString,
  asOptionalVector3,
  asVector3,
} from '../validation.js';
import type { Vector3 } from '../validation.js';
import type { ActorInfo, TransformChange } from '../host/types.js';

import { actionFailure, defineAction, jsonResult } from './types.js';
import type { ActionContext, ActionTable } from './types.js';

function dimensions(extent: Vector3): Vector3 {
  return [extent[0] * 2, extent[1] * 2, extent[2] * 2];
}

function actorDetails(actor: ActorInfo): Record<string, unknown> {
  return {
    label: actor.label,
    class: actor.classPath,
    location: actor.location,
    rotation: actor.rotation,
    scale: actor.scale,
    world_bounds_origin: actor.boundsOrigin,
    world_bounds_extent: actor.boundsExtent,
    world_dimensions: dimensions(actor.boundsExtent),
    ...(actor.staticMeshPath
      ? { static_mesh_asset_path: actor.staticMeshPath }
      : {}),
  };
}

function applyTransform(
  ctx: ActionContext,
  actorLabel: string,
  change: TransformChange,
): string {
  if (!ctx.host.findActorByLabel(actorLabel)) {
    return actionFailure(`Actor with label '${actorLabel}' not found.`);
  }

  const modified = (['location', 'rotation', 'scale'] as const).filter(
    (key) => change[key] !== undefined,
  );
  if (modified.length === 0) {
    return jsonResult({
      success: true,
      message: `No transform properties provided for actor '${actorLabel}'. Actor was not modified.`,
    });
  }

  const actor = ctx.host.transaction(
    `Set Transform for actor ${actorLabel}`,
    () => ctx.host.setActorTransform(actorLabel, change),
  );
  return jsonResult({
    success: true,
    message: `Actor '${actorLabel}' transform updated for: ${modified.join(', ')}.`,
    actor: actorDetails(actor),
  });
}

export const actions: ActionTable = {
  ue_spawn_from_class: defineAction({
    description:
      'Spawn an actor from a class path at a location with an optional [pitch, yaw, roll] rotation.',
    params: {
      class_path: asNonEmptyString,
      location: asVector3,
      rotation: asOptionalVector3,
    },
    run({ class_path, location, rotation }, ctx) {
      if (!ctx.host.isClassLoadable(class_path)) {
        return actionFailure(
          `Failed to load actor class from path: ${class_path}. Ensure it's a valid class path (e.g., with _C for Blueprints or /Script/ for native classes).`,
        );
      }
      const actor = ctx.host.transaction('Spawn Actor from Class', () =>
        ctx.host.spawnActorFromClass(class_path, location, rotation ?? [0, 0, 0]),
      );
      if (!actor) {
        return actionFailure(
          'Failed to spawn actor. The host returned no actor.',
        );
      }
      return jsonResult({
        success: true,
        actor_label: actor.label,
        actor_path: actor.path,
      });
    },
  }),

  ue_spawn_from_object: defineAction({
    description: 'Spawn an actor from a Content Browser asset at a location.',
    params: {
      asset_path: asNonEmptyString,
      location: asVector3,
    },
    run({ asset_path, location }, ctx) {
      if (!ctx.host.findAsset(asset_path)) {
        return actionFailure(`Asset not found: ${asset_path}`);
      }
      const actor = ctx.host.transaction('Spawn Actor from Object', () =>
        ctx.host.spawnActorFromAsset(asset_path, location),
      );
      if (!actor) {
        return actionFailure(
          `Failed to spawn actor. Asset cannot be placed in a level: ${asset_path}`,
        );
      }
      return jsonResult({
        success: true,
        actor_label: actor.label,
        actor_path: actor.path,
      });
    },
  }),

  ue_delete_by_label: defineAction({
    description: 'Delete the actor with the given label from the level.',
    params: { actor_label: asNonEmptyString },
    run({ actor_label }, ctx) {
      const deleted = ctx.host.transaction(`Delete actor ${actor_label}`, () =>
        ctx.host.destroyActor(actor_label),
      );
      if (!deleted) {
        return actionFailure(`No actor found with name: ${actor_label}`);
      }
      return jsonResult({
        success: true,
        message: `Deleted actors: ${actor_label}`,
        deleted_actors: [actor_label],
      });
    },
  }),

  ue_list_all_with_locations: defineAction({
    description: 'List every actor in the level with its world location.',
    params: {},
    run(_params, ctx) {
      const actors = ctx.host
        .getAllActors()
        .map((actor) => ({ name: actor.label, location: actor.location }));
      return jsonResult({ success: true, actors });
    },
  }),

  ue_get_all_details: defineAction({
    description:
      'List every actor with label, class, transform and world-space bounds.',
    params: {},
    run(_params, ctx) {
      return jsonResult({
        success: true,
        actors: ctx.host.getAllActors().map(actorDetails),
      });
    },
  }),

  ue_set_transform: defineAction({
    description:
      'Set location, rotation and/or scale of an actor. Omitted components stay unchanged.',
    params: {
      actor_label: asNonEmptyString,
      location: asOptionalVector3,
      rotation: asOptionalVector3,
      scale: asOptionalVector3,
    },
    run({ actor_label, location, rotation, scale }, ctx) {
      return applyTransform(ctx, actor_label, { location, rotation, scale });
    },
  }),

  ue_set_location: defineAction({
    description: 'Set the world location of an actor.',
    params: { actor_label: asNonEmptyString, location: asVector3 },
    run({ actor_label, location }, ctx) {
      return applyTransform(ctx, actor_label, { location });
    },
  }),

  ue_set_rotation: defineAction({
    description: 'Set the [pitch, yaw, roll] rotation of an actor.',
    params: { actor_label: asNonEmptyString, rotation: asVector3 },
    run({ actor_label, rotation }, ctx) {
      return applyTransform(ctx, actor_label, { rotation });
    },
  }),

  ue_set_scale: defineAction({
    description: 'Set the 3D scale of an actor.',
    params: { actor_label: asNonEmptyString, scale: asVector3 },
    run({ actor_label, scale }, ctx) {
      return applyTransform(ctx, actor_label, { scale });
    },
  }),

  ue_select_all: defineAction({
    description: 'Select every actor in the level.',
    params: {},
    run(_params, ctx) {
      ctx.host.selectAll();
      return jsonResult({ success: true, message: 'All actors selected.' });
    },
  }),

  ue_invert_selection: defineAction({
    description: 'Invert the actor selection.',
    params: {},
    run(_params, ctx) {
      ctx.host.invertSelection();
      return jsonResult({ success: true, message: 'Actor selection inverted.' });
    },
  }),

  ue_duplicate_selected: defineAction({
    description: 'Duplicate every selected actor, moving each copy by an offset.',
    params: { offset: asVector3 },
    run({ offset }, ctx) {
      const selected = ctx.host.getSelectedActors();
      if (selected.length === 0) return actionFailure('No actors selected.');

      const duplicated = ctx.host.transaction('Duplicate selected actors', () =>
        selected
          .map((actor) => ctx.host.duplicateActor(actor.label, offset))
          .filter((actor): actor is ActorInfo => actor !== null)
          .map((actor) => actor.label),
      );
      return jsonResult({
        success: true,
        message: `Duplicated ${duplicated.length} actors with offset [${offset.join(', ')}].`,
        duplicated_actors: duplicated,
      });
    },
  }),
};
