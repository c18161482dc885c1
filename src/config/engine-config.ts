import { readFileSync } from 'node:fs';
import { parseDocument } from 'yaml';
import { z } from 'zod';

export type EngineConfigErrorCode = 'CONFIG_UNREADABLE' | 'CONFIG_YAML_INVALID' | 'CONFIG_INVALID';

export type EngineConfigErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: EngineConfigErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

export class EngineConfigError extends Error {
  readonly code: EngineConfigErrorCode;
  readonly context?: EngineConfigErrorContext;

  constructor(code: EngineConfigErrorCode, message: string, context?: EngineConfigErrorContext, cause?: unknown) {
    super(formatMessage(message, context), cause === undefined ? undefined : { cause });
    this.name = 'EngineConfigError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export function isEngineConfigError(error: unknown): error is EngineConfigError {
  return error instanceof EngineConfigError;
}

const MessageSchema = z.string();

/**
 * Fixed texts the engine prints on its own account. Templates use `{name}`
 * placeholders.
 */
export const SystemMessagesSchema = z
  .object({
    notUnderstood: MessageSchema.default("I don't understand your command."),
    cantDoYet: MessageSchema.default("I can't do that yet."),
    tooMuchToCarry: MessageSchema.default("I've too much to carry!"),
    cantGoThatWay: MessageSchema.default("I can't go in that direction."),
    dangerousDark: MessageSchema.default('Dangerous to move in the dark!'),
    fellInDark: MessageSchema.default('I fell down and broke my neck.'),
    dead: MessageSchema.default("I'm dead..."),
    tooDark: MessageSchema.default("I can't see. It is too dark!"),
    lightOut: MessageSchema.default('Light has run out!'),
    lightDim: MessageSchema.default('Light is getting dim.'),
    ok: MessageSchema.default('O.K.'),
    what: MessageSchema.default('What?'),
    notHere: MessageSchema.default("I don't see that here."),
    notCarrying: MessageSchema.default("I'm not carrying it!"),
    roomPrefix: MessageSchema.default("I'm in a "),
    exits: MessageSchema.default('Obvious exits: {exits}.'),
    noExits: MessageSchema.default('none'),
    alsoSee: MessageSchema.default('I can also see: {items}'),
    inventoryHeader: MessageSchema.default("I'm carrying:"),
    inventoryEmpty: MessageSchema.default('Nothing'),
    scoreStored: MessageSchema.default("I've stored {stored} treasures."),
    scoreRating: MessageSchema.default('On a scale of 0 to 100, that rates {rating}.'),
    victory: MessageSchema.default("Well done! You've found all the treasures!"),
    gameOver: MessageSchema.default('The game is now over.'),
    directions: z
      .array(MessageSchema)
      .length(6)
      .default(['North', 'South', 'East', 'West', 'Up', 'Down']),
  })
  .strict();

const VerbNumberSchema = z.number().int().min(1).max(149);

export const EngineConfigSchema = z
  .object({
    lightSourceItem: z.number().int().min(0).default(9),
    lowLightThreshold: z.number().int().min(0).default(25),
    destroyLightOnExhaust: z.boolean().default(false),
    darkFallChance: z.number().int().min(0).max(100).default(25),
    delayMs: z.number().int().min(0).default(2000),
    verbs: z
      .object({
        go: VerbNumberSchema.default(1),
        get: VerbNumberSchema.default(10),
        drop: VerbNumberSchema.default(18),
      })
      .strict()
      .default({}),
    vocabularyLayout: z.enum(['sequential', 'interleaved']).default('sequential'),
    actionValidation: z.enum(['error', 'warning']).default('error'),
    messages: SystemMessagesSchema.default({}),
  })
  .strict();

export type SystemMessages = z.output<typeof SystemMessagesSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

export function parseEngineConfig(value: unknown, sourceId = 'config'): EngineConfig {
  const result = EngineConfigSchema.safeParse(value ?? {});
  if (!result.success) {
    throw new EngineConfigError('CONFIG_INVALID', `Invalid engine configuration in ${sourceId}.`, {
      sourceId,
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  return result.data;
}

export const createEngineConfig = (input: EngineConfigInput = {}): EngineConfig => parseEngineConfig(input);

export function parseEngineConfigYaml(text: string, sourceId = 'config.yaml'): EngineConfig {
  const document = parseDocument(text, {
    schema: 'core',
    strict: true,
    uniqueKeys: true,
    prettyErrors: false,
  });

  if (document.errors.length > 0) {
    throw new EngineConfigError('CONFIG_YAML_INVALID', `Engine configuration ${sourceId} is not valid YAML.`, {
      sourceId,
      errors: document.errors.map((error) => error.message),
    });
  }

  return parseEngineConfig(document.toJSON(), sourceId);
}

export function loadEngineConfig(path: string): EngineConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new EngineConfigError('CONFIG_UNREADABLE', `Cannot read engine configuration ${path}.`, { path }, error);
  }

  return parseEngineConfigYaml(text, path);
}

export function formatTemplate(template: string, values: Readonly<Record<string, string | number>>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}
