export type StageTag = "bootstrap" | "config" | "preflight" | "deps" | "workspace" | "launch";

export type Writer = (text: string) => void;

export type Reporter = {
  step: (tag: StageTag, message: string) => void;
  ok: (tag: StageTag, message: string) => void;
  warn: (tag: StageTag, message: string) => void;
  note: (tag: StageTag, message: string) => void;
  fail: (tag: StageTag, message: string) => void;
};

export const createReporter = (out: { stdout: Writer; stderr: Writer }): Reporter => {
  const line = (write: Writer, tag: StageTag, text: string) => {
    write(`[${tag}] ${text}\n`);
  };
  return {
    step: (tag, message) => line(out.stdout, tag, message),
    ok: (tag, message) => line(out.stdout, tag, `ok: ${message}`),
    warn: (tag, message) => line(out.stdout, tag, `warning: ${message}`),
    note: (tag, message) => line(out.stdout, tag, `  ${message}`),
    fail: (tag, message) => line(out.stderr, tag, `error: ${message}`),
  };
};

export const processReporter = (): Reporter =>
  createReporter({
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
  });
