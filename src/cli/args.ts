import { ProviderNameSchema, type ProviderName } from "../core/config/index.js";
import { ExecutionModeSchema, type ExecutionMode } from "../core/schemas/index.js";

export interface CliOptions {
  prompt: string;
  mode?: ExecutionMode;
  /** undefined defers to AUTO_RENDER. */
  render?: boolean;
  export?: boolean;
  save?: boolean;
  validate: boolean;
  provider?: ProviderName;
  dryRun: boolean;
  interactive: boolean;
  help: boolean;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export const USAGE = `Usage: blender-scene-ai [prompt...] [options]

Generate Blender 3D scenes from natural language prompts.

Options:
  --mode <background|gui>   Execution mode (default: DEFAULT_MODE)
  --render                  Render the scene to an image
  --no-render               Do not render, overriding AUTO_RENDER
  --export                  Export the model in EXPORT_FORMAT
  --save                    Save the scene as a .blend file
  --no-validate             Skip static validation of generated code
  --provider <name>         claude | openai | local | mock
  --dry-run                 Generate, validate and save without running Blender
  -i, --interactive         Prompt repeatedly; also the default with no prompt
  -h, --help                Show this help`;

export function parseCliArgs(argv: string[]): ParseResult {
  const options: CliOptions = {
    prompt: "",
    validate: true,
    dryRun: false,
    interactive: false,
    help: false,
  };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    switch (arg) {
      case "--mode": {
        const parsed = ExecutionModeSchema.safeParse(argv[++i]);
        if (!parsed.success) {
          return { ok: false, error: "--mode expects one of: background, gui" };
        }
        options.mode = parsed.data;
        break;
      }
      case "--provider": {
        const parsed = ProviderNameSchema.safeParse(argv[++i]);
        if (!parsed.success) {
          return { ok: false, error: `--provider expects one of: ${ProviderNameSchema.options.join(", ")}` };
        }
        options.provider = parsed.data;
        break;
      }
      case "--render":
        options.render = true;
        break;
      case "--no-render":
        options.render = false;
        break;
      case "--export":
        options.export = true;
        break;
      case "--save":
        options.save = true;
        break;
      case "--no-validate":
        options.validate = false;
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "-i":
      case "--interactive":
        options.interactive = true;
        break;
      case "-h":
      case "--help":
        options.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          return { ok: false, error: `Unknown option: ${arg}` };
        }
        words.push(arg);
    }
  }

  options.prompt = words.join(" ").trim();
  if (!options.prompt) {
    options.interactive = true;
  }
  return { ok: true, options };
}
