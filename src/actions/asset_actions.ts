import { asNonEmptyString, asOptionalString } from '../validation.js';

import { actionFailure, defineAction, jsonResult } from './types.js';
import type { ActionTable } from './types.js';

export const actions: ActionTable = {
  ue_find_asset_by_query: defineAction({
    description:
      'Find asset paths by case-insensitive name substring and/or exact asset class.',
    params: { name: asOptionalString, asset_type: asOptionalString },
    run({ name, asset_type }, ctx) {
      if (name === undefined && asset_type === undefined) {
        return jsonResult({
          success: false,
          message: "At least one of 'name' or 'asset_type' must be provided.",
          assets: [],
        });
      }

      const needle = name?.toLowerCase();
      const wantedType = asset_type?.toLowerCase();
      const matches = ctx.host
        .listAssets()
        .filter((asset) => !needle || asset.path.toLowerCase().includes(needle))
        .filter(
          (asset) => !wantedType || asset.assetClass.toLowerCase() === wantedType,
        )
        .map((asset) => asset.path);

      return jsonResult({
        success: true,
        assets: matches,
        message: `${matches.length} assets found matching query.`,
      });
    },
  }),

  ue_get_static_mesh_asset_details: defineAction({
    description: 'Bounding box and dimensions of a static mesh asset.',
    params: { asset_path: asNonEmptyString },
    run({ asset_path }, ctx) {
      const asset = ctx.host.findAsset(asset_path);
      if (!asset || asset.assetClass !== 'StaticMesh' || !asset.meshStats) {
        return actionFailure(
          `Asset is not a StaticMesh or could not be loaded: ${asset_path}`,
        );
      }

      const [ex, ey, ez] = asset.meshStats.boundsExtent;
      return jsonResult({
        success: true,
        details: {
          asset_path,
          bounding_box_min: { x: -ex, y: -ey, z: -ez },
          bounding_box_max: { x: ex, y: ey, z: ez },
          dimensions: { x: ex * 2, y: ey * 2, z: ez * 2 },
          lod_count: asset.meshStats.lodCount,
          vertex_count: asset.meshStats.vertexCount,
          triangle_count: asset.meshStats.triangleCount,
        },
      });
    },
  }),
};
