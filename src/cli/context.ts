import { classifierConfig, paths } from '../config.js';
import { RegistryConfigError, loadRoleRegistry, type RoleRegistry } from '../templates/roleRegistry.js';

export function loadRegistryOrExit(): RoleRegistry {
  try {
    return loadRoleRegistry(paths.roleCategories, { fallbackKey: classifierConfig.fallbackRole });
  } catch (error) {
    if (error instanceof RegistryConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}
