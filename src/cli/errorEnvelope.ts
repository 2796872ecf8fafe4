export type CrawlErrorReportContext = {
  batch?: number;
  identifiers?: number;
  id?: string;
};

export type CliErrorEnvelope = {
  event: string;
  name: string;
  message: string;
  code?: string;
  context?: CrawlErrorReportContext;
  stack?: string;
};

const maxIdLength = 128;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const countOf = (raw: unknown): number | undefined =>
  typeof raw === "number" && Number.isInteger(raw) && raw >= 0 ? raw : undefined;

// Identifiers come from the input file; keep them to one short printable line.
const identifierOf = (raw: unknown): string | undefined => {
  if (typeof raw !== "string") return undefined;
  const printable = raw.replace(/[\u0000-\u001f\u007f]/g, "").trim();
  return printable.length > 0 ? printable.slice(0, maxIdLength) : undefined;
};

const reportContext = (value: unknown): CrawlErrorReportContext | undefined => {
  if (!isRecord(value)) return undefined;

  const context: CrawlErrorReportContext = {};
  const batch = countOf(value.batch);
  const identifiers = countOf(value.identifiers);
  const id = identifierOf(value.id);
  if (batch !== undefined) context.batch = batch;
  if (identifiers !== undefined) context.identifiers = identifiers;
  if (id !== undefined) context.id = id;

  return Object.keys(context).length > 0 ? context : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/**
 * One-line report for a failed CLI run: error name, message, failure code and
 * the batch position (plus the identifier for worker faults). Causes are
 * never included; the stack only in debug mode.
 */
export const buildCliErrorEnvelope = (event: string, err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const details = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = { event, name: error.name || "Error", message: error.message };
  if (typeof details.code === "string") envelope.code = details.code;

  const context = reportContext(details.context);
  if (context) envelope.context = context;

  if (includeStack && typeof error.stack === "string") envelope.stack = error.stack;
  return envelope;
};

export const reportCliFailure = (event: string, err: unknown): never => {
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(buildCliErrorEnvelope(event, err, isDebugMode())));
  return process.exit(1);
};
