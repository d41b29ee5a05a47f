import express, { type Request, type Response } from 'express';

import {
  OUTPUT_EXTENSION,
  QUANTIZED_ALGORITHMS,
  QUANTIZED_DTYPES,
  QUANTIZED_METHODS,
  SUPPORTED_FORMATS,
  TARGET_PLATFORMS
} from '../config/formats';

export const formatsRouter = express.Router();

formatsRouter.get('/', (_req: Request, res: Response) => {
  res.json({
    formats: SUPPORTED_FORMATS.map((rule) => ({
      format: rule.format,
      label: rule.label,
      primary: rule.primary,
      required: rule.required,
      optional: rule.optional,
      extensions: rule.extensions
    })),
    output: OUTPUT_EXTENSION,
    targetPlatforms: TARGET_PLATFORMS,
    quantization: {
      dtypes: QUANTIZED_DTYPES,
      algorithms: QUANTIZED_ALGORITHMS,
      methods: QUANTIZED_METHODS
    }
  });
});
