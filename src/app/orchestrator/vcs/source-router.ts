import type { SourceType } from "../../../core/config.js";
import type { VersionControlBackend, WorkspaceTree } from "../../../core/source-extractor.js";

// Dispatches each call to the backend for the locator's source type.
export function createSourceRouter(
  backends: Record<SourceType, VersionControlBackend>,
): VersionControlBackend {
  const owners = new WeakMap<WorkspaceTree, VersionControlBackend>();

  return {
    resolveRef(locator, ref, options) {
      return backends[locator.type].resolveRef(locator, ref, options);
    },

    async materialize(locator, resolvedRef, subtreePath, options) {
      const backend = backends[locator.type];
      const tree = await backend.materialize(locator, resolvedRef, subtreePath, options);
      owners.set(tree, backend);
      return tree;
    },

    async release(tree) {
      const backend = owners.get(tree);
      if (!backend) {
        throw new Error(`Workspace ${tree.root} was not materialized through this router.`);
      }
      owners.delete(tree);
      await backend.release(tree);
    },
  };
}
