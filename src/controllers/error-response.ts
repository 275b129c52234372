import { Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { AppError } from '../utils/errors';
import logger from '../utils/logger';

/**
 * Send the JSON error body for a failed request.
 * Application errors keep their status and message; anything else is a 500.
 */
export const sendError = (res: Response, error: unknown, fallbackMessage: string): void => {
  if (error instanceof AppError) {
    logger.warn(`${fallbackMessage}: ${error.message}`);
    res.status(error.statusCode).json({
      success: false,
      error: error.message,
    });
    return;
  }

  logger.error(fallbackMessage, error);
  res.status(StatusCodes.INTERNAL_SERVER_ERROR).json({
    success: false,
    error: fallbackMessage,
  });
};
