//https://github.com/microsoft/TypeScript/issues/57226
//IMPORTANT: an ambient declaration is resolved before the package's own typings,
//so this file is what the compiler sees for "axe"
declare module "axe" {
  class Axe implements Record<Axe.BaseLevels, Axe.LoggerMethod> {
    constructor(config?: Axe.Options);
    trace: Axe.LoggerMethod;
    debug: Axe.LoggerMethod;
    info: Axe.LoggerMethod;
    warn: Axe.LoggerMethod;
    error: Axe.LoggerMethod;
    fatal: Axe.LoggerMethod;
    log: Axe.LoggerMethod;
    setLevel(level: string): void;
    getNormalizedLevel(level: string): string;
    config: {
      version: string;
      levels: string[];
    };
  }

  namespace Axe {
    export type BaseLevels =
      | "trace"
      | "debug"
      | "info"
      | "warn"
      | "error"
      | "fatal";

    export type LoggerMethod = (...args: unknown[]) => Promise<void>;

    /**
     * Anything console-like; axe needs at least `info` or `log`.
     */
    export interface Logger {
      info?: (...args: unknown[]) => void;
      log?: (...args: unknown[]) => void;
      [method: string]: unknown;
    }

    export interface Options {
      /**
       * If `true` and the message is an Error, the Error itself is handed to the logger.
       *
       * @default true
       */
      showStack?: boolean;

      meta?: {
        /**
         * Whether or not to output metadata to logger methods.
         *
         * @default true
         */
        show?: boolean;
        omittedFields?: string[];
        pickedFields?: (string | symbol)[];
      };

      /**
       * Whether or not to invoke logger methods.
       *
       * @default false
       */
      silent?: boolean;

      /**
       * @default console
       */
      logger?: Logger;

      /**
       * @default `false` if `NODE_ENV` is `"development"` otherwise the hostname
       */
      name?: string | boolean;

      /**
       * @default 'info'
       */
      level?: string;

      /**
       * @default ['info','warn','error','fatal']
       */
      levels?: string[];

      /**
       * Whether or not to parse application information (using parse-app-info).
       *
       * @default true
       */
      appInfo?: boolean;
    }
  }

  export default Axe;
}
