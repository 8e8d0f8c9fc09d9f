#!/usr/bin/env node
import { CommandLine } from './options/commandLine';
import { VERSION } from './options/constants';
import { FatalError } from './options/diagnostics';
import { Options } from './options/options';
import { LogFunction } from './options/types';

export interface CliIO {
    stdout: LogFunction;
    stderr: LogFunction;
}

const defaultIO: CliIO = {
    stdout: (message) => process.stdout.write(message + '\n'),
    stderr: (message) => process.stderr.write(message + '\n')
};

/**
 * Process argv and print the resolved inputs as JSON.
 * Returns the exit status: 1 when anything was reported as an error.
 */
export async function main(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
    // Trace output only once --debug or --debugi has been seen
    const options: Options = new Options({
        log: (message) => {
            if (options.values.debugLevel > 0) io.stderr(`- ${message}`);
        }
    });
    const commandLine = new CommandLine(options);

    let fatal = false;
    try {
        commandLine.parseOpts(argv);
    } catch (e) {
        if (!(e instanceof FatalError)) throw e;
        fatal = true;
    }

    for (const line of options.reporter.format()) io.stderr(line);
    if (fatal || options.reporter.hasErrors()) return 1;

    options.finalize();
    const values = options.values;
    if (values.showVersion) {
        io.stdout(`hdl-options ${VERSION}`);
        return 0;
    }
    if (values.generateKey) {
        io.stdout(await options.protectKeyDefaulted());
        return 0;
    }

    const summary = options.summary();
    if (values.protectIds) {
        summary.protectKey = await options.protectKeyDefaulted();
    }
    io.stdout(JSON.stringify(summary, null, 2));
    return 0;
}

if (require.main === module) {
    main(process.argv.slice(2)).then(
        (status) => {
            process.exitCode = status;
        },
        (err: unknown) => {
            process.stderr.write(`${err instanceof Error ? err.stack : String(err)}\n`);
            process.exitCode = 1;
        }
    );
}
