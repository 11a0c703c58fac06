import fs from 'fs';
import { parse as yamlParse } from 'yaml';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

import { type Address, readIchainEnv } from '@ichain/utils';

const AddressListSchema = z.array(z.string().min(1));

export const RelayerConfigSchema = z.object({
  relayer: z.string().min(1),
  whitelist: z
    .object({
      senders: AddressListSchema.optional(),
      recipients: AddressListSchema.optional(),
    })
    .strict()
    .optional(),
});

export type RelayerConfigInput = z.infer<typeof RelayerConfigSchema>;

export class RelayerConfig {
  constructor(public readonly config: RelayerConfigInput) {}

  /**
   * Loads a YAML (or JSON) relayer config file
   */
  static load(filePath: string): RelayerConfig {
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = yamlParse(content);
    const validationResult = RelayerConfigSchema.safeParse(parsed);
    if (!validationResult.success) {
      throw new Error(fromZodError(validationResult.error).message);
    }
    return new RelayerConfig(validationResult.data);
  }

  /**
   * @returns the config named by RELAYER_CONFIG, or undefined if unset
   */
  static loadFromEnv(): RelayerConfig | undefined {
    const { RELAYER_CONFIG } = readIchainEnv();
    return RELAYER_CONFIG ? RelayerConfig.load(RELAYER_CONFIG) : undefined;
  }

  get relayer(): Address {
    return this.config.relayer;
  }

  get whitelist(): RelayerConfigInput['whitelist'] {
    return this.config.whitelist;
  }
}
