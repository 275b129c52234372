/**
 * catalog.controller.ts
 * Catalog status and reload
 */

import { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import catalogService from '../services/catalog.service';
import { sendError } from './error-response';

/**
 * @desc    Get record and per-country counts of the loaded catalog
 * @route   GET /api/catalog/stats
 * @access  Public
 */
export const getCatalogStats = (req: Request, res: Response): void => {
  res.status(StatusCodes.OK).json({
    success: true,
    data: catalogService.getStats(),
  });
};

/**
 * @desc    Re-read the catalog file; the previous catalog stays active if this fails
 * @route   POST /api/catalog/reload
 * @access  Public
 */
export const reloadCatalog = async (req: Request, res: Response): Promise<void> => {
  try {
    const catalog = await catalogService.reload();
    res.status(StatusCodes.OK).json({
      success: true,
      count: catalog.length,
      data: catalogService.getStats(),
    });
  } catch (error) {
    sendError(res, error, 'Server error while reloading catalog');
  }
};
