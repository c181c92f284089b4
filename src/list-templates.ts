import { loadRegistryOrExit } from './cli/context.js';
import { paths } from './config.js';
import { listAvailableTemplates } from './templates/templateFiles.js';

function showTemplates() {
  const registry = loadRegistryOrExit();
  const templates = listAvailableTemplates(registry, paths.templatesDir);

  console.log('\n=== AVAILABLE TEMPLATES (sorted by priority) ===\n');
  for (const template of templates) {
    const cv = template.cvExists ? '✓' : '✗';
    const cl = template.clExists ? '✓' : '✗';
    const fallback = template.role === registry.fallbackKey ? ' [fallback]' : '';
    console.log(`  P${template.priority} ${template.displayName}: CV=${cv} CL=${cl}${fallback}`);
    console.log(`     ${template.keywords.length} keywords`);
  }

  const missing = templates.filter(t => !t.cvExists || !t.clExists).length;
  console.log(`\nTotal categories: ${templates.length} (${missing} with missing template files)`);
  console.log(`Templates directory: ${paths.templatesDir}`);
}

showTemplates();
