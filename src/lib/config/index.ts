export {
  loadUserConfig,
  saveUserConfig,
  updateUserConfig,
  resolveDefaults,
  getConfigFilePath,
} from "./user-config";
export type { UserConfig, ResolvedDefaults } from "./user-config";
