import { isWithinSet } from "../../core/records/setSpec";
import type { SetHierarchyMode, SetHierarchyResolver } from "../../ports/SetHierarchyResolver";

export const createSetHierarchyResolver = (mode: SetHierarchyMode): SetHierarchyResolver => ({
  mode,
  supportsSets: () => mode !== "none",
  matches: (setFilter, memberships) => {
    switch (mode) {
      case "hierarchical":
        return memberships.some((membership) => isWithinSet(setFilter, membership));
      case "flat":
        return memberships.includes(setFilter);
      case "none":
        return false;
    }
  }
});
