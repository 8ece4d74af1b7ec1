#!/usr/bin/env node

/// # CLI
///
/// the command-line front end. it reads the options, starts the runtime
/// for the file, and hands the segment stream to the driver.
///
/// ```bash
/// litstep tour.py                    # run everything, no pauses
/// litstep tour.py -i                 # enter to advance, q to quit
/// litstep tour.py -i -ff 4           # run snippets 1-4 silently, then pause
/// litstep tour.py -i -ff "plotting"  # run silently up to the "plotting" docs
/// litstep tour.ts -l ./lib -e        # script runtime, echo code, extra load path
/// ```
///
/// configuration problems are reported on stderr with exit status 1
/// before anything runs. snippet errors never end the process.

import { runWalkthrough } from "./driver.js";
import { ConfigurationError } from "./errors.js";
import { createEvaluator, EvaluationContext } from "./evaluate.js";
import { parseArguments, resolveConfig, USAGE } from "./options.js";
import { TerminalPresenter } from "./present.js";
import { LinePrompt } from "./prompt.js";
import { segmentFile } from "./segment.js";

const VERSION = "0.1.0";

async function main(argv: string[]): Promise<number> {
  const args = parseArguments(argv);

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.version) {
    console.log(VERSION);
    return 0;
  }

  const config = resolveConfig(args, {
    env: process.env,
    platform: process.platform,
    isTTY: process.stdout.isTTY === true,
  });

  /// read before the runtime starts, so an unreadable file leaves no kernel behind.
  const segments = segmentFile(config.filename, config.dialect);
  const evaluator = await createEvaluator(config);
  const presenter = new TerminalPresenter({
    out: process.stdout,
    color: config.color,
    language: config.runtime === "python" ? "python" : "typescript",
  });
  const prompt = config.interactive ? new LinePrompt(process.stdin) : undefined;

  try {
    await runWalkthrough(
      segments,
      { context: new EvaluationContext(evaluator), presenter, prompt },
      config,
    );
  } finally {
    prompt?.close();
  }
  return 0;
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (error) {
  if (!(error instanceof ConfigurationError)) throw error;
  console.error(`litstep: ${error.message}`);
  process.exitCode = 1;
}
