/**
 * recommendation.controller.ts
 * Handles requests for taste-based coffee recommendations
 */

import { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import recommendationService from '../services/recommendation.service';
import recommendationFormatter from '../services/recommendation-formatter.service';
import { performanceMonitor } from '../utils/performance-monitor';
import { ValidationError } from '../utils/errors';
import { sendError } from './error-response';

/**
 * Pull the preference text from the request body
 * @throws ValidationError when it is missing, blank or not a string
 */
const readPreference = (req: Request): string => {
  const body: unknown = req.body;
  const preference =
    typeof body === 'object' && body !== null && 'preference' in body ? body.preference : undefined;

  if (typeof preference !== 'string' || preference.trim() === '') {
    throw new ValidationError('Please provide a taste preference');
  }
  return preference;
};

/**
 * Get the classification criteria
 * @route GET /api/recommendations/criteria
 * @access Public
 */
export const getCriteria = (req: Request, res: Response): void => {
  res.status(StatusCodes.OK).json({
    success: true,
    data: recommendationService.getCriteria(),
  });
};

/**
 * Get structured recommendations for a taste preference
 * @route POST /api/recommendations
 * @access Public
 */
export const getRecommendations = async (req: Request, res: Response): Promise<void> => {
  try {
    const preference = readPreference(req);
    const outcome = await recommendationService.recommend(preference);

    res.status(StatusCodes.OK).json({
      success: true,
      data: outcome,
    });
  } catch (error) {
    sendError(res, error, 'Server error while getting recommendations');
  }
};

/**
 * Get recommendations rendered as markdown
 * @route POST /api/recommendations/formatted
 * @access Public
 */
export const getFormattedRecommendations = async (req: Request, res: Response): Promise<void> => {
  try {
    const preference = readPreference(req);
    const outcome = await recommendationService.recommend(preference);
    const markdown = await recommendationFormatter.format(preference, outcome);

    res.status(StatusCodes.OK).json({
      success: true,
      type: outcome.type,
      data: markdown,
    });
  } catch (error) {
    sendError(res, error, 'Server error while formatting recommendations');
  }
};

/**
 * Get timing metrics for recommendation passes
 * @route GET /api/recommendations/metrics
 * @access Public
 */
export const getPerformanceMetrics = (req: Request, res: Response): void => {
  res.status(StatusCodes.OK).json({
    success: true,
    data: performanceMonitor.getPerformanceSummary(),
  });
};
