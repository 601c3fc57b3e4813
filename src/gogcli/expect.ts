/** Exit status the generated script uses when the timeout fires. */
export const EXPECT_TIMEOUT_EXIT = 124;

export interface ExpectScriptOptions {
  argv: string[];
  prompt: string;
  timeoutSeconds: number;
}

/**
 * Quote one word for Tcl. Inside double quotes only backslash, `$`, `[` and
 * the closing quote are special.
 */
export function tclQuote(word: string): string {
  return `"${word.replace(/[\\$[\]"]/g, (c) => `\\${c}`)}"`;
}

/**
 * Expect script that spawns `argv` on a pseudo-terminal, answers the first
 * passphrase prompt with an empty line and then lets the rest of the session
 * run to EOF. The child's exit status becomes the script's.
 */
export function buildExpectScript(options: ExpectScriptOptions): string {
  const { argv, prompt, timeoutSeconds } = options;
  if (argv.length === 0) {
    throw new Error("argv must name a command");
  }

  const onTimeout = [
    "  timeout {",
    `    puts stderr ${tclQuote(`Timed out after ${timeoutSeconds} seconds`)}`,
    `    exit ${EXPECT_TIMEOUT_EXIT}`,
    "  }",
  ];

  return [
    `set timeout ${timeoutSeconds}`,
    "log_user 1",
    `spawn -noecho ${argv.map(tclQuote).join(" ")}`,
    "expect {",
    `  -exact ${tclQuote(prompt)} {`,
    '    send "\\r"',
    "  }",
    ...onTimeout,
    "  eof {",
    "    exit [lindex [wait] 3]",
    "  }",
    "}",
    "expect {",
    ...onTimeout,
    "  eof",
    "}",
    "exit [lindex [wait] 3]",
    "",
  ].join("\n");
}

/**
 * Undo the pty's line endings and drop the line carrying the prompt. Every
 * other line is returned as the child wrote it.
 */
export function cleanTranscript(raw: string, prompt: string): string {
  const lines = raw.replace(/\r\n/g, "\n").split("\n");
  const promptLine = lines.findIndex((line) => line.includes(prompt));
  if (promptLine !== -1) {
    lines.splice(promptLine, 1);
  }
  return lines.join("\n").trim();
}
