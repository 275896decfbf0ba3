/**
 * Setup command for PayPal credentials
 *
 * Stores an encrypted PayPal configuration. The script in
 * apps/web/scripts/setup-paypal.ts wires this to process.argv and the
 * service-role Supabase client.
 */

import { DEFAULT_PAYPAL_MODE, isPayPalMode, type PayPalMode } from '@payhub/database';
import { maskSecret } from '@payhub/shared';
import type { PayPalCredentialService } from '@/lib/paypal';

export const DEFAULT_CONFIG_NAME = 'Default PayPal Account';

export const SETUP_USAGE =
  'Usage: setup-paypal --client-id <id> --client-secret <secret> [--name <name>] [--mode sandbox|live] [--force]';

export interface SetupPayPalOptions {
  name: string;
  clientId: string;
  clientSecret: string;
  mode: PayPalMode;
  force: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOutput {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleOutput: CliOutput = {
  info: (message) => console.log(message),
  success: (message) => console.log(`✅ ${message}`),
  warn: (message) => console.warn(`⚠️  ${message}`),
  error: (message) => console.error(`❌ ${message}`),
};

const VALUE_FLAGS = ['--name', '--client-id', '--client-secret', '--mode'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(flag);
}

/**
 * Parse `--flag value` and `--flag=value` arguments
 */
export function parseSetupArgs(args: string[]): SetupPayPalOptions {
  const values = new Map<ValueFlag, string>();
  let force = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--force') {
      force = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (!isValueFlag(flag)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    if (eq !== -1) {
      values.set(flag, arg.slice(eq + 1));
      continue;
    }

    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    values.set(flag, next);
    i++;
  }

  const clientId = values.get('--client-id');
  const clientSecret = values.get('--client-secret');

  if (!clientId) {
    throw new UsageError('--client-id is required');
  }
  if (!clientSecret) {
    throw new UsageError('--client-secret is required');
  }

  const mode = values.get('--mode') ?? DEFAULT_PAYPAL_MODE;
  if (!isPayPalMode(mode)) {
    throw new UsageError(`Invalid mode '${mode}' (choose from 'sandbox', 'live')`);
  }

  return {
    name: values.get('--name') || DEFAULT_CONFIG_NAME,
    clientId,
    clientSecret,
    mode,
    force,
  };
}

type SetupCredentialService = Pick<PayPalCredentialService, 'hasConfiguration' | 'storeCredentials'>;

/**
 * Run the setup command and return the process exit code
 */
export async function runSetupPayPal(
  args: string[],
  credentials: SetupCredentialService,
  output: CliOutput = consoleOutput
): Promise<number> {
  let options: SetupPayPalOptions;
  try {
    options = parseSetupArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      output.error(error.message);
      output.info(SETUP_USAGE);
      return 1;
    }
    throw error;
  }

  try {
    if (!options.force && (await credentials.hasConfiguration(options.name))) {
      output.warn(`Configuration "${options.name}" already exists. Use --force to update.`);
      return 0;
    }

    const config = await credentials.storeCredentials({
      name: options.name,
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      mode: options.mode,
    });

    output.success(`Successfully created PayPal configuration: ${config.name} (${config.mode})`);
    output.info(`Client ID: ${maskSecret(options.clientId)}`);

    if (options.mode === 'sandbox') {
      output.warn('Note: Using sandbox mode. For production, use --mode live');
    }

    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    output.error(`Failed to set up PayPal credentials: ${message}`);
    return 1;
  }
}
