import { ZodError } from 'zod';
import { envSchema, formatEnvIssues, withoutBlankValues, type Env } from './envSchema.js';

let env: Env;
try {
    env = envSchema.parse(withoutBlankValues(process.env));
} catch (err) {
    if (err instanceof ZodError) {
        const e = new Error(formatEnvIssues(err));
        console.error(e.message);
        process.exit(1);
        throw e;
    }
    throw err;
}

export { env };
export type { Env };
