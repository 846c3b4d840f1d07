export interface GeminiArgsInput {
  prompt: string;
  sandbox?: boolean;
  sessionId?: string;
  model?: string;
}

/**
 * Argument vector for one non-interactive turn:
 * `--prompt <text> -o stream-json [--sandbox] [--model <name>] [--resume <id>]`.
 */
export function buildGeminiArgs(input: GeminiArgsInput, platform: NodeJS.Platform = process.platform): string[] {
  const prompt = platform === 'win32' ? escapeWindowsPrompt(input.prompt) : input.prompt;
  const args = ['--prompt', prompt, '-o', 'stream-json'];

  if (input.sandbox) args.push('--sandbox');
  if (input.model) args.push('--model', input.model);
  if (input.sessionId) args.push('--resume', input.sessionId);

  return args;
}

/**
 * The Windows launcher re-parses the command line, so control characters and
 * quotes in the prompt must reach it escaped. Backslash goes first.
 */
export function escapeWindowsPrompt(prompt: string): string {
  return prompt
    .replaceAll('\\', '\\\\')
    .replaceAll('"', '\\"')
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\r')
    .replaceAll('\t', '\\t')
    .replaceAll('\b', '\\b')
    .replaceAll('\f', '\\f')
    .replaceAll("'", "\\'");
}
