#!/usr/bin/env node
import "dotenv/config";

import type { EditSessionOptions } from "./edit-session.js";
import type { Alignment } from "./scroll-window.js";

import LineInput from "./components/line-input.js";
import TextValidator from "./text-validator.js";
import {
  loadConfig,
  presetPattern,
  toSessionOptions,
} from "./utils/config.js";
import { initLogger, log } from "./utils/logger/log.js";
import { render, useApp, useInput } from "ink";
import meow from "meow";
import React from "react";

// Open the debug log before the config is read so its warnings are kept.
// Stays a no-op unless DEBUG is set.
initLogger();

const cli = meow(
  `
  Usage
    $ lineedit [options]

  Reads one line from the terminal and prints it to stdout. <Enter> submits,
  <Esc> cancels without output.

  Options
    -h, --help                 Show usage and exit
    -p, --pattern <regex>      Input validator (the whole text must match)
    --preset <name>            Validator preset: all, int, uint, float
    -m, --max-chars <n>        Character limit (0 = none)
    --password <char>          Mask the input with <char>
    --limit-width              Refuse input once the field is full instead of scrolling
    -w, --width <columns>      Width of the field, suffix included
    --align <side>             left, center or right
    --suffix <text>            Text shown at the right edge of the field
    --placeholder <text>       Text shown while the field is empty
    --initial <text>           Initial contents
    -c, --config <file>        Config file (default: ~/.lineedit/config.json)

  Examples
    $ lineedit --preset uint --max-chars 3 --suffix " kg"
    $ lineedit --password "*" --placeholder "passphrase"
`,
  {
    importMeta: import.meta,
    autoHelp: true,
    flags: {
      help: { type: "boolean", shortFlag: "h" },
      pattern: { type: "string", shortFlag: "p" },
      preset: { type: "string" },
      maxChars: { type: "number", shortFlag: "m" },
      password: { type: "string" },
      limitWidth: { type: "boolean" },
      width: { type: "number", shortFlag: "w" },
      align: { type: "string", choices: ["left", "center", "right"] },
      suffix: { type: "string" },
      placeholder: { type: "string" },
      initial: { type: "string" },
      config: { type: "string", shortFlag: "c" },
    },
  },
);

function isAlignment(value: string): value is Alignment {
  return value === "left" || value === "center" || value === "right";
}

const config = loadConfig(cli.flags.config);
const options: EditSessionOptions = toSessionOptions(config);

// --pattern is always a regular expression; --preset only takes preset names.
if (cli.flags.pattern !== undefined) {
  options.inputValidator = cli.flags.pattern;
} else if (cli.flags.preset !== undefined) {
  const preset = presetPattern(cli.flags.preset);
  if (preset === undefined) {
    // eslint-disable-next-line no-console
    console.error(
      `lineedit: unknown preset ${JSON.stringify(cli.flags.preset)} (expected all, int, uint or float)`,
    );
    process.exit(1);
  }
  options.inputValidator = preset;
}
if (
  options.inputValidator !== undefined &&
  !new TextValidator().setPattern(options.inputValidator)
) {
  // eslint-disable-next-line no-console
  console.error(
    `lineedit: ${JSON.stringify(options.inputValidator)} is not a valid regular expression`,
  );
  process.exit(1);
}
if (cli.flags.maxChars !== undefined) {
  options.maxChars = cli.flags.maxChars;
}
if (cli.flags.password !== undefined) {
  options.passwordChar = cli.flags.password;
}
if (cli.flags.limitWidth) {
  options.limitWidth = true;
}
if (cli.flags.align !== undefined && isAlignment(cli.flags.align)) {
  options.alignment = cli.flags.align;
}
if (cli.flags.suffix !== undefined) {
  options.suffix = cli.flags.suffix;
}
if (cli.flags.placeholder !== undefined) {
  options.defaultText = cli.flags.placeholder;
}
if (cli.flags.initial !== undefined) {
  options.text = cli.flags.initial;
}

const width =
  cli.flags.width ??
  config.width ??
  Math.max(20, (process.stdout.columns ?? 80) - 2);

let submitted: string | undefined;

function Prompt(): React.ReactElement {
  const { exit } = useApp();

  useInput((_input, key) => {
    if (key.escape) {
      exit();
    }
  });

  return (
    <LineInput
      width={width}
      options={options}
      onSubmit={(text) => {
        submitted = text;
        exit();
      }}
    />
  );
}

log(`[lineedit] prompting in ${width} columns`);

const { waitUntilExit } = render(<Prompt />);
await waitUntilExit();

if (submitted !== undefined) {
  process.stdout.write(`${submitted}\n`);
}
