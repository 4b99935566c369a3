import { parseArgs } from "node:util";
import type { ExtractRequest, GetRequest } from "./batch/options.js";
import { ConfigurationError, errorMessage } from "./core/errors.js";
import { ANNOTATE_FORMATS, isAnnotateFormat, type AnnotateOptions } from "./metadata/annotate.js";
import type { RunSelection } from "./metadata/runResolver.js";
import { isVerbosity, VERBOSITIES, type Verbosity } from "./runs/invocationContext.js";

export const USAGE = `usage:
  runfetch get (-r RUN... | --run-identifiers-list FILE | -p BIOPROJECT...) -m METHOD... -f FORMAT... [options]
  runfetch extract --sra FILE... -f FORMAT... [options]
  runfetch annotate (-r RUN... | --run-identifiers-list FILE | -p BIOPROJECT...) [-f pretty|csv|tsv|json|feather] [-o FILE] [--all-columns]

methods:  ena-ascp ena-ftp prefetch aws-http aws-cp gcp-cp (tried in the order given)
formats:  sra fastq fastq.gz fasta fasta.gz

common options:
  --output-directory DIR     where outputs go (default: $RUNFETCH_OUTPUT_DIR or .)
  --force                    redo work even when outputs exist
  --unsorted                 single-pass dump in file order
  --stdout                   with --unsorted, stream one uncompressed format to stdout
  --extraction-threads N     --batch-concurrency N
  --hide-download-progress   --verbosity debug|info|warn|error
  --policy FILE              policy YAML (default: $RUNFETCH_POLICY_PATH or the bundled policy)

get options:
  --download-threads N       --check-md5sums           --prefetch-max-size SIZE
  --allow-paid               --allow-paid-from-aws     --allow-paid-from-gcp
  --gcp-project P            --gcp-user-key-file F
  --aws-user-key-id K        --aws-user-key-secret S
  --ascp-ssh-key F           --ascp-args "ARGS"
`;

interface Invocation {
  verbosity: Verbosity;
  hideProgress: boolean;
  policyPath: string | null;
}

export type CliCommand =
  | { command: "help" }
  | (Invocation & {
      command: "get";
      selection: RunSelection;
      request: Omit<GetRequest, "stdout">;
      stdout: boolean;
    })
  | (Invocation & {
      command: "extract";
      inputs: string[];
      request: Omit<ExtractRequest, "stdout">;
      stdout: boolean;
    })
  | (Invocation & {
      command: "annotate";
      selection: RunSelection;
      options: AnnotateOptions;
    });

const COMMON_OPTIONS = {
  "output-directory": { type: "string" },
  force: { type: "boolean" },
  unsorted: { type: "boolean" },
  stdout: { type: "boolean" },
  "extraction-threads": { type: "string" },
  "batch-concurrency": { type: "string" },
  "hide-download-progress": { type: "boolean" },
  verbosity: { type: "string" },
  policy: { type: "string" },
  format: { type: "string", short: "f", multiple: true }
} as const;

const SELECTION_OPTIONS = {
  "run-identifiers": { type: "string", short: "r", multiple: true },
  "run-identifiers-list": { type: "string" },
  bioproject: { type: "string", short: "p", multiple: true }
} as const;

const GET_OPTIONS = {
  ...COMMON_OPTIONS,
  ...SELECTION_OPTIONS,
  method: { type: "string", short: "m", multiple: true },
  "download-threads": { type: "string" },
  "allow-paid": { type: "boolean" },
  "allow-paid-from-aws": { type: "boolean" },
  "allow-paid-from-gcp": { type: "boolean" },
  "gcp-project": { type: "string" },
  "gcp-user-key-file": { type: "string" },
  "aws-user-key-id": { type: "string" },
  "aws-user-key-secret": { type: "string" },
  "ascp-ssh-key": { type: "string" },
  "ascp-args": { type: "string" },
  "prefetch-max-size": { type: "string" },
  "check-md5sums": { type: "boolean" }
} as const;

const EXTRACT_OPTIONS = {
  ...COMMON_OPTIONS,
  sra: { type: "string", multiple: true }
} as const;

const ANNOTATE_OPTIONS = {
  ...SELECTION_OPTIONS,
  format: { type: "string", short: "f" },
  output: { type: "string", short: "o" },
  "all-columns": { type: "boolean" },
  verbosity: { type: "string" },
  policy: { type: "string" }
} as const;

/** `-f fastq -f fastq.gz` and `-f fastq,fastq.gz` mean the same. */
export function splitList(values: readonly string[] | undefined): string[] {
  return (values ?? []).flatMap((v) => v.split(",")).map((v) => v.trim()).filter(Boolean);
}

export function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) throw new ConfigurationError(`${flag} expects a positive integer, got ${JSON.stringify(value)}`);
  return Number(value);
}

function parseVerbosity(value: string | undefined): Verbosity {
  if (value === undefined) return "info";
  if (!isVerbosity(value)) {
    throw new ConfigurationError(`--verbosity must be one of ${VERBOSITIES.join(", ")}`);
  }
  return value;
}

function selectionOf(values: {
  "run-identifiers"?: string[];
  "run-identifiers-list"?: string;
  bioproject?: string[];
}): RunSelection {
  return {
    runIds: splitList(values["run-identifiers"]),
    runIdentifiersList: values["run-identifiers-list"] ?? null,
    bioprojects: splitList(values.bioproject)
  };
}

function parsing<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw new ConfigurationError(errorMessage(err));
  }
}

export function parseCli(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const [command, ...rest] = argv;
  const defaultOutputDir = env.RUNFETCH_OUTPUT_DIR ?? ".";

  switch (command) {
    case undefined:
    case "help":
    case "-h":
    case "--help":
      return { command: "help" };

    case "get": {
      const { values } = parsing(() => parseArgs({ args: [...rest], options: GET_OPTIONS, strict: true }));
      return {
        command: "get",
        verbosity: parseVerbosity(values.verbosity),
        hideProgress: values["hide-download-progress"] ?? false,
        policyPath: values.policy ?? null,
        selection: selectionOf(values),
        stdout: values.stdout ?? false,
        request: {
          methods: splitList(values.method),
          formats: splitList(values.format),
          outputDir: values["output-directory"] ?? defaultOutputDir,
          force: values.force ?? false,
          unsorted: values.unsorted ?? false,
          extractionThreads: parseCount(values["extraction-threads"], "--extraction-threads"),
          batchConcurrency: parseCount(values["batch-concurrency"], "--batch-concurrency"),
          downloadThreads: parseCount(values["download-threads"], "--download-threads"),
          paidAccess: {
            allowPaid: values["allow-paid"] ?? false,
            allowPaidFromAws: values["allow-paid-from-aws"] ?? false,
            allowPaidFromGcp: values["allow-paid-from-gcp"] ?? false
          },
          credentials: {
            ...(values["gcp-project"] ? { gcpProject: values["gcp-project"] } : {}),
            ...(values["gcp-user-key-file"] ? { gcpUserKeyFile: values["gcp-user-key-file"] } : {}),
            ...(values["aws-user-key-id"] ? { awsUserKeyId: values["aws-user-key-id"] } : {}),
            ...(values["aws-user-key-secret"] ? { awsUserKeySecret: values["aws-user-key-secret"] } : {}),
            ...(values["ascp-ssh-key"] ? { ascpSshKey: values["ascp-ssh-key"] } : {})
          },
          ascpArgs: values["ascp-args"],
          prefetchMaxSize: values["prefetch-max-size"],
          checkMd5sums: values["check-md5sums"] ?? false
        }
      };
    }

    case "extract": {
      const { values, positionals } = parsing(() =>
        parseArgs({ args: [...rest], options: EXTRACT_OPTIONS, strict: true, allowPositionals: true })
      );
      return {
        command: "extract",
        verbosity: parseVerbosity(values.verbosity),
        hideProgress: values["hide-download-progress"] ?? false,
        policyPath: values.policy ?? null,
        inputs: [...(values.sra ?? []), ...positionals],
        stdout: values.stdout ?? false,
        request: {
          formats: splitList(values.format),
          outputDir: values["output-directory"] ?? defaultOutputDir,
          force: values.force ?? false,
          unsorted: values.unsorted ?? false,
          extractionThreads: parseCount(values["extraction-threads"], "--extraction-threads"),
          batchConcurrency: parseCount(values["batch-concurrency"], "--batch-concurrency")
        }
      };
    }

    case "annotate": {
      const { values } = parsing(() => parseArgs({ args: [...rest], options: ANNOTATE_OPTIONS, strict: true }));
      const format = values.format ?? "pretty";
      if (!isAnnotateFormat(format)) {
        throw new ConfigurationError(`annotate format must be one of ${ANNOTATE_FORMATS.join(", ")}`);
      }
      return {
        command: "annotate",
        verbosity: parseVerbosity(values.verbosity),
        hideProgress: true,
        policyPath: values.policy ?? null,
        selection: selectionOf(values),
        options: { format, outputFile: values.output ?? null, allColumns: values["all-columns"] ?? false }
      };
    }

    default:
      throw new ConfigurationError(`unknown command ${JSON.stringify(command)} (expected get, extract or annotate)`);
  }
}
