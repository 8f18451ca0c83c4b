import fs from 'fs';
import path from 'path';
import { swaggerSpec } from '../src/swagger/swagger.config';

/**
 * Write the OpenAPI document next to the build output
 */
const outputPath = path.join(__dirname, '../dist/openapi.json');

fs.mkdirSync(path.dirname(outputPath), { recursive: true });
fs.writeFileSync(outputPath, JSON.stringify(swaggerSpec, null, 2));

const paths = 'paths' in swaggerSpec && typeof swaggerSpec.paths === 'object' && swaggerSpec.paths
  ? Object.keys(swaggerSpec.paths).length
  : 0;

console.log(`✅ OpenAPI spec generated: ${outputPath}`);
console.log(`   Endpoints found: ${paths}`);
