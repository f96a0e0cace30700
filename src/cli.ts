#!/usr/bin/env node
import cac from 'cac';
import { version } from '../package.json';
import { buildActivity, type ActivityOptions } from './cli/activity';
import { withPresence } from './client';
import { PresenceError } from './errors';

interface CommonOptions {
    debug?: boolean;
}

const cli = cac('rich-presence');

cli
    .command('set <clientId>', 'Set an activity and hold it until interrupted')
    .option('--state <text>', 'Second line of the activity')
    .option('--details <text>', 'First line of the activity')
    .option('--start <time>', 'Elapsed-time start: "now" or Unix seconds')
    .option('--end <time>', 'Remaining-time end: Unix seconds')
    .option('--large-image <key>', 'Large image asset key or URL')
    .option('--large-text <text>', 'Large image hover text')
    .option('--small-image <key>', 'Small image asset key or URL')
    .option('--small-text <text>', 'Small image hover text')
    .option('--button <label=url>', 'Button, repeatable (at most two)')
    .option('--debug', 'Enable debug logging')
    .action(async (clientId: string, options: ActivityOptions & CommonOptions) => {
        const activity = buildActivity(options);

        await withPresence(clientId, async (presence) => {
            await presence.set(activity);
            console.log(`✅ Activity set via ${presence.getEndpoint() ?? 'IPC'}. Press Ctrl+C to exit.`);
            const signal = await waitForSignal();
            console.log(`ℹ️  ${signal} received, closing.`);
        }, { debug: options.debug });
    });

cli
    .command('clear <clientId>', 'Clear the current activity')
    .option('--debug', 'Enable debug logging')
    .action(async (clientId: string, options: CommonOptions) => {
        await withPresence(clientId, (presence) => presence.clear(), { debug: options.debug });
        console.log('✅ Activity cleared.');
    });

cli.help();
cli.version(version);

main().catch((error: unknown) => {
    if (error instanceof PresenceError) {
        console.error(`❌ ${error.name}: ${error.message}`);
    } else {
        console.error('❌', error);
    }
    process.exit(1);
});

async function main(): Promise<void> {
    cli.parse(process.argv, { run: false });
    if (!cli.matchedCommand && !cli.options.help && !cli.options.version) {
        cli.outputHelp();
        return;
    }
    await cli.runMatchedCommand();
}

function waitForSignal(): Promise<NodeJS.Signals> {
    return new Promise((resolve) => {
        const onSignal = (signal: NodeJS.Signals) => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
            resolve(signal);
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);
    });
}
