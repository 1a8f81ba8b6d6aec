export { UnstakingVault, type UnstakingVaultDeps } from "./unstaking-vault.js";
