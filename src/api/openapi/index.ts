import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';
import { listFields, type ConfigField } from '../../services/schema-registry/index.js';

const currentDir = dirname(fileURLToPath(import.meta.url));
const specPath = join(currentDir, 'spec.yaml');

function describeField(field: ConfigField): string {
  const parts: string[] = [field.type];
  if (field.required) parts.push('required');
  if (field.defaultValue !== undefined) parts.push(`default ${String(field.defaultValue)}`);
  if (field.constraint.kind === 'range') {
    parts.push(`range [${field.constraint.min ?? '-inf'}, ${field.constraint.max ?? 'inf'}]`);
  }
  if (field.constraint.kind === 'enum') parts.push(`one of ${field.constraint.values.join(', ')}`);
  if (field.constraint.kind === 'prefix') parts.push(`starts with '${field.constraint.prefix}'`);
  return parts.join('; ');
}

// Declared fields are listed on the snapshot schema so /docs stays in step with the registry.
function loadSpec() {
  const doc = YAML.parseDocument(readFileSync(specPath, 'utf-8'));
  const properties = Object.fromEntries(
    listFields().map((field) => [field.name, { type: 'string', description: describeField(field) }]),
  );
  doc.setIn(['components', 'schemas', 'EnvSnapshot', 'properties'], properties);
  return doc.toJS();
}

const spec = loadSpec();

export function setupOpenAPI(app: Express): void {
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(spec, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Settings Validation API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(spec);
  });
}
