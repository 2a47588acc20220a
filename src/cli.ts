import 'dotenv/config';
import { loadConfig } from './config';
import { runOracle } from './runner';

try {
    process.exitCode = runOracle(process.argv.slice(2), loadConfig());
} catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
}
