import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// The workspace root holds the single .env shared by the CLI and the pipeline.
// Variables already present in the process environment win.
export const envFile = path.join(__dirname, '../../../.env');

dotenv.config({ path: envFile });
