import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

import { createApp } from './app';
import { DEFAULT_RULES_PATH, loadRuleSet } from './config/rules';
import { readEnv } from './config/env';

const env = readEnv();
const rulesPath = env.RULES_PATH ? path.resolve(env.RULES_PATH) : DEFAULT_RULES_PATH;
const rules = loadRuleSet(rulesPath);
console.log(
  `Loaded ${rules.aliasTable.fields.length} canonical fields, ${rules.normalization.length} value rules and ` +
    `${rules.classification.length} feedback rules from ${rulesPath}`
);

const app = createApp({ rules, uploadLimitMb: env.UPLOAD_LIMIT_MB, topLimit: env.TOP_RESPONSES });

app.listen(env.PORT, () => {
  console.log(`AI usage insights API running on ${env.PORT}`);
});
