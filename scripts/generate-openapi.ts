import fs from 'fs';
import path from 'path';
import { getSwaggerSpec } from '../src/swagger/swagger.config';

/**
 * Write the OpenAPI document (default dist/openapi.json)
 *
 * Usage: npm run openapi -- [output.json]
 */
const outputPath = path.resolve(process.argv[2] ?? path.join(__dirname, '../dist/openapi.json'));
const spec = getSwaggerSpec();

fs.mkdirSync(path.dirname(outputPath), { recursive: true });
fs.writeFileSync(outputPath, `${JSON.stringify(spec, null, 2)}\n`);

const paths = 'paths' in spec && spec.paths && typeof spec.paths === 'object' ? Object.keys(spec.paths) : [];
console.log(`OpenAPI document written to ${outputPath}`);
for (const route of paths.sort()) {
  console.log(`  ${route}`);
}
