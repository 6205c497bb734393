import { jest } from '@jest/globals';
import type { ConversionOptions, ExternalConverter } from '../../src/types';

/**
 * In-process stand-in for the soffice pool
 */
export class FakeConverter implements ExternalConverter {
  readonly convert = jest.fn<(input: Buffer, options: ConversionOptions) => Promise<Buffer>>();
  readonly isAvailable = jest.fn<() => Promise<boolean>>();

  constructor(output: Buffer = Buffer.from('converted by soffice'), available = true) {
    this.convert.mockResolvedValue(output);
    this.isAvailable.mockResolvedValue(available);
  }
}
