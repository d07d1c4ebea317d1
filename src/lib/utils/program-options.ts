export interface ProgramOption<V> {
    /** single letter, used as `-x` */
    alias?: string;
    description: string;
    /** shown in usage, e.g. `--mac <mac>` */
    placeholder?: string;
    /** takes no value, parses to `true` */
    flag?: boolean;
    /** @throws ProgramOptionError */
    parse(val: string): V;
}

export class ProgramOptionError extends Error {
    constructor(reason: string = "invalid value") {
        super(reason);
    }
}

export type ProgramOptions = Record<string, ProgramOption<unknown>>;

export type ProgramOptionValues<T extends ProgramOptions> = {
    [K in keyof T]?: T[K] extends ProgramOption<infer V> ? V : never;
};

export type ProgramOptionsParseResult<T extends ProgramOptions> = (
    {
        success: true;
        options: ProgramOptionValues<T>;
        problem?: undefined;
    } |
    {
        success: false;
        options?: undefined;
        problem: "MISSING" | "INVALID" | "UNKNOWN";
        /** index of argument that caused the problem */
        idx: number;
        args: string[];
        /** option that caused the problem, if one was recognised */
        option?: string;
        reason?: string;
    }
);

/** class that retains the option types for the result */
export class ProgramOptionDefinition<const T extends ProgramOptions> {
    definition: T;

    constructor(definition: T) {
        this.definition = definition;
    }

    private resolve(arg: string): string | undefined {
        if (arg.startsWith("--")) {
            let name = arg.substring(2);
            return Object.hasOwn(this.definition, name) ? name : undefined;
        }
        if (/^-[^-]$/.test(arg)) {
            let alias = arg.substring(1);
            return Object.keys(this.definition).find((name) => this.definition[name].alias == alias);
        }
        return undefined;
    }

    parse(args: string[]): ProgramOptionsParseResult<T> {
        let values: Record<string, unknown> = {};

        for (let i = 0; i < args.length; i++) {
            let arg = args[i];
            let inline: string | undefined = undefined;

            // --name=value
            let eq = arg.indexOf("=");
            if (arg.startsWith("--") && eq > 2) {
                inline = arg.substring(eq + 1);
                arg = arg.substring(0, eq);
            }

            let name = this.resolve(arg);
            if (name === undefined) {
                return { success: false, problem: "UNKNOWN", idx: i, args };
            }

            let option = this.definition[name];
            if (option.flag) {
                if (inline !== undefined) {
                    return { success: false, problem: "INVALID", idx: i, args, option: name, reason: "takes no value" };
                }
                values[name] = true;
                continue;
            }

            let val = inline;
            if (val === undefined) {
                if (i + 1 >= args.length) {
                    return { success: false, problem: "MISSING", idx: i, args, option: name };
                }
                val = args[++i];
            }

            try {
                values[name] = option.parse(val);
            } catch (error) {
                if (!(error instanceof ProgramOptionError)) {
                    throw error;
                }
                return { success: false, problem: "INVALID", idx: i, args, option: name, reason: error.message };
            }
        }

        return {
            success: true,
            options: values as ProgramOptionValues<T>,
        }
    }

    message(result: ProgramOptionsParseResult<T>): string {
        if (result.success) {
            return "All args parsed successfully";
        }

        if (result.problem == "MISSING") {
            return `option: "--${result.option}" missing value`;
        }

        if (result.problem == "INVALID") {
            return `option: "--${result.option}" ${result.reason ?? "invalid value"}`;
        }

        return `argument: "${result.args[result.idx]}" unknown`;
    }

    /** usage rows, [flags, description] */
    content(): [string, string][] {
        return Object.keys(this.definition).map((name) => {
            let option = this.definition[name];
            let sb = option.alias ? `-${option.alias}, ` : "    ";
            sb += `--${name}`;
            if (!option.flag) {
                sb += ` <${option.placeholder ?? name}>`;
            }
            return [sb, option.description];
        });
    }
}

type OptionMeta = Pick<ProgramOption<unknown>, "alias" | "description" | "placeholder">;

class ProgramOptionFactory /** POFactory */ {
    static create<T>(meta: OptionMeta, parse: ProgramOption<T>["parse"]): ProgramOption<T> {
        return { ...meta, parse };
    }

    static value(meta: OptionMeta): ProgramOption<string> {
        return ProgramOptionFactory.create(meta, (val) => {
            if (!val.trim()) {
                throw new ProgramOptionError("must not be empty");
            }
            return val;
        });
    }

    static flag(meta: OptionMeta): ProgramOption<true> {
        return {
            ...meta,
            flag: true,
            parse: () => true,
        };
    }
}

export const POFactory = ProgramOptionFactory;
