export type SetHierarchyMode = "hierarchical" | "flat" | "none";

export interface SetHierarchyResolver {
  readonly mode: SetHierarchyMode;
  supportsSets(): boolean;
  matches(setFilter: string, memberships: readonly string[]): boolean;
}
