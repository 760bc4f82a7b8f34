import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { ConfigError } from '../config.js';
import { HttpError, PipelineError } from '../errors.js';

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof ConfigError) {
    return res.status(400).json({
      message: 'invalid_configuration',
      detail: err.message,
      issues: err.issues,
    });
  }

  if (err instanceof multer.MulterError) {
    return res.status(400).json({
      message: 'upload_rejected',
      detail: err.message,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  if (err instanceof PipelineError) {
    return res.status(422).json(err.toJSON());
  }

  if (err instanceof Error) {
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};
