export interface ServerConfig {
  readonly bindAddress: string;
  readonly port: number;
  readonly indexRoute: string;
  /** Absolute, symlink-free path of the served directory. */
  readonly rootDir: string;
}

export type Resolution =
  | {
      kind: "redirect";
      to: string;
    }
  | {
      kind: "serve";
      filePath: string;
    }
  | {
      kind: "not_found";
    };

export interface SvgResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer | string;
}

export interface Logger {
  error: (message: string) => void;
}
