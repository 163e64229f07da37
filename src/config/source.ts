import fs from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export const CHAIN_TYPES = ['index', 'stock'] as const;

export type ChainType = (typeof CHAIN_TYPES)[number];

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', '..', 'config', 'default.yaml');

const headerSchema = z.record(z.union([z.string(), z.number()]).transform(String));

const defaultsSchema = z.object({
    config: z.object({
        header: headerSchema,
        uri: z.object({
            base: z.string().url(),
            type: z.object({
                index: z.string(),
                stock: z.string(),
            }),
        }),
    }),
});

// Same layout as the defaults, every key optional, plus the direct overrides.
const userSchema = z.object({
    config: z
        .object({
            header: headerSchema.optional(),
            uri: z
                .object({
                    base: z.string().url().optional(),
                    type: z.object({ index: z.string(), stock: z.string() }).partial().optional(),
                })
                .optional(),
            apiuri: z.string().url().optional(),
            type: z.enum(CHAIN_TYPES).optional(),
        })
        .default({}),
});

/** Everything the fetcher needs to build its request. */
export type FetcherSettings = {
    headers: Record<string, string>;
    baseUrl: string;
    pathByType: Record<ChainType, string>;
    type: ChainType;
    /** Replaces the computed URL when set; `{symbol}` is still substituted. */
    apiUri?: string;
};

const readYaml = <S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> => {
    let text: string;
    try {
        text = fs.readFileSync(file, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read config file ${file}`, { cause: error });
    }

    let document: unknown;
    try {
        document = parse(text);
    } catch (error) {
        throw new ConfigError(`Config file ${file} is not valid YAML`, { cause: error });
    }

    const result = schema.safeParse(document ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid config file ${file}: ${issues.join('; ')}`);
    }
    return result.data;
};

/**
 * Build fetcher settings from the bundled defaults, an optional user file
 * merged over them, and an explicit chain type (which wins over both).
 */
export const loadFetcherSettings = (
    options: { userFile?: string; type?: ChainType; defaultsFile?: string } = {},
): FetcherSettings => {
    const defaults = readYaml(options.defaultsFile ?? DEFAULT_CONFIG_PATH, defaultsSchema).config;
    const user = options.userFile ? readYaml(options.userFile, userSchema).config : undefined;

    return {
        headers: { ...defaults.header, ...user?.header },
        baseUrl: user?.uri?.base ?? defaults.uri.base,
        pathByType: {
            index: user?.uri?.type?.index ?? defaults.uri.type.index,
            stock: user?.uri?.type?.stock ?? defaults.uri.type.stock,
        },
        type: options.type ?? user?.type ?? 'index',
        apiUri: user?.apiuri,
    };
};
