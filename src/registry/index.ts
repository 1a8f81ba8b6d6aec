export { type AccessControl, type AssetListing, type AssetRegistry, Role } from "./types.js";
export { InMemoryAssetRegistry } from "./asset-registry.js";
export { StaticAccessControl, type RoleAssignments, hasRole, requireRole } from "./access-control.js";
