import Path from 'path';
import { readConfig } from './config';
import { runTrim } from './analyze';
import { describeError } from './errors';

async function main() {
    const [, , configPath] = process.argv;
    if(!configPath) {
        console.error('usage: binding-trim <config file>');
        process.exitCode = 1;
        return;
    }
    const config = await readConfig(Path.resolve(configPath));
    await runTrim(config);
}

main().catch((e: unknown) => {
    console.error(`error: ${describeError(e)}`);
    process.exitCode = 1;
});
