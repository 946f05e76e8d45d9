// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
// SPDX-License-Identifier: GPL-3.0-or-later
import { exit } from 'node:process';
import { loadPullConfig, loadTransifexConfig } from './config';
import { ConfigError } from './errors';
import { runPullJob } from './pull';
import { pull } from './settings';
import { TransifexClient } from './transifex';

function printUsage()
{
    console.log('Usage:');
    console.log(`  tsx index.ts [pull-config] [api-token-file]`);
    console.log('');
    console.log(`  pull-config: YAML pull configuration or a Transifex .tx/config (default: ./${pull.defaultConfigFile})`);
    console.log('  api-token-file: file holding the Transifex API token (default: $TRANSIFEX_API_TOKEN,');
    console.log('                  then ./transifex_api_token, then transifex_api_token beside this program)');
}

async function main(args: string[])
{
    if (args.includes('-h') || args.includes('--help')) {
        printUsage();
        return;
    }
    const [configPath = pull.defaultConfigFile, tokenFile] = args;

    const jobs = loadPullConfig(configPath);
    console.log(`Loaded ${jobs.length} resource(s) from ${configPath}`);

    const client = new TransifexClient(loadTransifexConfig(tokenFile));
    for (const job of jobs) {
        const written = await runPullJob(job, client);
        console.log(`Wrote ${written.length} file(s) for ${job.resource.resource}`);
    }
    console.log('\nDone.');
}

main(process.argv.slice(2)).catch(error => {
    if (error instanceof ConfigError) {
        console.error(error.message);
    } else {
        console.error('Pull failed:', error);
    }
    exit(1);
});
