#!/usr/bin/env node
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { buildConfig, DEFAULT_SIZES, type ThumbnailerArgs, type ThumbnailerConfig } from './shared/config/config';
import { describeEnv, loadEnv } from './shared/env/loadEnv';
import { ConfigError, errorMessage, isThumbnailerError } from './shared/errors';
import { log } from './shared/logging/logger';
import { runThumbnailer } from './run';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;

/** Parses CLI arguments into raw options; usage errors become ConfigError. */
export function parseArgs(args: string[]): ThumbnailerArgs {
  const argv = yargs(args)
    .scriptName('thumbnailer')
    .usage('$0 [options]\n\nGenerate resize-to-fill thumbnails for a directory or a bucket prefix.')
    .option('path', {
      alias: 'p',
      type: 'string',
      describe: 'Local directory holding the gallery to generate crops for',
    })
    .option('out', {
      type: 'string',
      describe: 'Directory to write thumbnails to (defaults to the source directory)',
    })
    .option('s3-bucket', {
      alias: 'b',
      type: 'string',
      describe: 'Bucket to publish thumbnails to (and fetch from, with --fetch-remote)',
    })
    .option('fetch-remote', {
      alias: 'r',
      type: 'boolean',
      default: false,
      describe: 'Fetch source images from the bucket given in --s3-bucket',
    })
    .option('s3-prefix', {
      type: 'string',
      describe: 'Object key prefix to fetch from; its first segment is the publish prefix',
    })
    .option('overwrite', {
      alias: 'o',
      type: 'boolean',
      default: false,
      describe: 'Also fetch remote keys that look like derivatives (names with "_")',
    })
    .option('clean', {
      type: 'boolean',
      default: true,
      describe: 'Wipe the working directory before fetching (use --no-clean to keep it)',
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      default: false,
      describe: 'Print the configuration and every progress update',
    })
    .option('size', {
      alias: 's',
      type: 'string',
      array: true,
      describe: `Crop size as WIDTHxHEIGHT, repeatable (default: ${DEFAULT_SIZES.join(' ')})`,
    })
    .option('format', {
      type: 'string',
      choices: ['jpeg', 'jpg', 'png', 'webp'],
      default: 'jpeg',
      describe: 'Output encoding',
    })
    .option('quality', {
      type: 'number',
      describe: 'Encoder quality for jpeg/webp, 1-100 (defaults to env THUMBNAILER_QUALITY or 82)',
    })
    .option('concurrency', {
      type: 'number',
      describe: 'Max concurrent transforms (defaults to env THUMBNAILER_CONCURRENCY or CPU count)',
    })
    .fail((msg, err) => {
      throw new ConfigError(msg || errorMessage(err));
    })
    .help()
    .strict()
    .parseSync();

  return {
    path: argv.path,
    out: argv.out,
    s3Bucket: argv['s3-bucket'],
    s3Prefix: argv['s3-prefix'],
    fetchRemote: argv['fetch-remote'],
    overwrite: argv.overwrite,
    clean: argv.clean,
    verbose: argv.verbose,
    size: argv.size?.map(String),
    format: argv.format,
    quality: argv.quality,
    concurrency: argv.concurrency,
  };
}

export async function main(args: string[] = hideBin(process.argv)): Promise<number> {
  const env = loadEnv();

  let config: ThumbnailerConfig;
  try {
    config = buildConfig(parseArgs(args), env);
  } catch (e) {
    log.cli.error(errorMessage(e));
    return e instanceof ConfigError ? EXIT_CONFIG : EXIT_FAILED;
  }

  log.cli.info('start', {
    source: config.sourceRoot,
    output: config.outputDir,
    sizes: config.sizes.length,
    bucket: config.remote?.bucket,
    fetch: config.remote?.fetch ?? false,
    env: describeEnv(env),
  });

  try {
    await runThumbnailer(config, env);
    return EXIT_OK;
  } catch (e) {
    if (isThumbnailerError(e)) {
      log.cli.error(`${e.code}: ${e.message}`, e.details);
    } else {
      log.cli.error(`fatal: ${e instanceof Error && e.stack ? e.stack : errorMessage(e)}`);
    }
    return EXIT_FAILED;
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((e) => {
      log.cli.error(`fatal: ${errorMessage(e)}`);
      process.exit(EXIT_FAILED);
    });
}
