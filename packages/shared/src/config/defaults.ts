/** Reserved name of the primary artifact, written in the invocation's working directory. */
export const DEFAULT_OUTPUT_FILENAME = 'codebase_context.md';

/** Reserved name of the side artifact holding the instruction prompt. */
export const DEFAULT_PROMPT_FILENAME = 'prompt.txt';

export const DEFAULT_LAUNCH_URL = 'https://gemini.google.com/app';

/** Environment variable consulted when no root is given on the command line. */
export const ROOT_ENV_VAR = 'CONTEXT_ROOT';

export const PROJECT_CONFIG_FILENAME = '.codepack.yaml';
