// Strawman validation middleware
// Rejects malformed strawman documents before the content generation stage runs

import type { RequestHandler } from 'express';
import type { IStrawman } from '../models';
import { parseStrawman } from '../services/contentGenerationStage';
import { StageInputError } from '../utils/errors';

export interface IStrawmanLocals extends Record<string, unknown> {
  presentation: IStrawman;
}

export interface IContentGenerationBody {
  presentation?: unknown;
}

export type StrawmanRequestHandler = RequestHandler<
  Record<string, string>,
  unknown,
  IContentGenerationBody | undefined,
  Record<string, unknown>,
  IStrawmanLocals
>;

/**
 * Validates the strawman in the request body
 *
 * What this does:
 * 1. Reads `presentation` from the JSON body
 * 2. Checks metadata and slides the same way the stage does
 * 3. If valid: attaches the parsed presentation to res.locals.presentation
 * 4. If invalid: sends 400 with the list of problems and stops
 */
export const validateStrawman: StrawmanRequestHandler = (req, res, next) => {
  try {
    res.locals.presentation = parseStrawman(req.body?.presentation);
    next();
  } catch (error) {
    if (error instanceof StageInputError) {
      res.status(400).json({
        success: false,
        error: error.message,
        issues: error.issues,
      });
      return;
    }
    next(error);
  }
};
