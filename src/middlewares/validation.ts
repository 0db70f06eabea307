// ============================================
// src/middlewares/validation.ts
// ============================================

import { Request, Response, NextFunction } from 'express';
import { body, query, validationResult, ValidationChain } from 'express-validator';
import { ValidationError } from '../utils/errors';

const absoluteUrl: Parameters<ValidationChain['isURL']>[0] = {
  protocols: ['http', 'https'],
  require_protocol: true,
  require_tld: false,
};

// Largest value a MongoDB cursor accepts for limit()
const MAX_LIMIT = 2 ** 31 - 1;

const requiredString = (field: string, label: string) =>
  body(field)
    .exists({ values: 'null' })
    .withMessage(`${label} is required`)
    .bail()
    .isString()
    .withMessage(`${label} must be a string`);

const optionalString = (field: string, label: string) =>
  body(field).optional({ values: 'null' }).isString().withMessage(`${label} must be a string`);

const requiredQueryString = (field: string) =>
  query(field)
    .exists()
    .withMessage(`${field} is required`)
    .bail()
    .isString()
    .withMessage(`${field} must be a single string`);

// ============================================
// MODULE VALIDATION
// ============================================
export const moduleValidation = {
  create: [
    requiredString('title', 'Module title'),
    optionalString('description', 'Description'),

    body('video_url')
      .exists({ values: 'null' })
      .withMessage('Video URL is required')
      .bail()
      .isString()
      .withMessage('Video URL must be a string')
      .bail()
      .isURL(absoluteUrl)
      .withMessage('Video URL must be an absolute http(s) URL'),

    body('thumbnail_url')
      .optional({ values: 'null' })
      .isString()
      .withMessage('Thumbnail URL must be a string')
      .bail()
      .isURL(absoluteUrl)
      .withMessage('Thumbnail URL must be an absolute http(s) URL'),

    optionalString('category', 'Category'),

    body('timestamps').optional({ values: 'null' }).isArray().withMessage('Timestamps must be an array'),
    body('timestamps.*').isObject().withMessage('Each timestamp must be an object'),
    body('timestamps.*.label')
      .isString()
      .withMessage('Timestamp label must be a string')
      .bail()
      .notEmpty()
      .withMessage('Timestamp label cannot be empty'),
    body('timestamps.*.time')
      .isInt({ min: 0 })
      .withMessage('Timestamp time must be a non-negative integer')
      .toInt(),

    body('resources').optional({ values: 'null' }).isArray().withMessage('Resources must be an array'),
    body('resources.*').isObject().withMessage('Each resource must be an object'),
    body('resources.*.label').isString().withMessage('Resource label must be a string'),
    body('resources.*.url')
      .isString()
      .withMessage('Resource URL must be a string')
      .bail()
      .isURL(absoluteUrl)
      .withMessage('Resource URL must be an absolute http(s) URL'),
    body('resources.*.type')
      .optional({ values: 'null' })
      .isString()
      .withMessage('Resource type must be a string'),
  ],

  list: [
    query('limit')
      .optional()
      .isInt({ min: 1, max: MAX_LIMIT })
      .withMessage(`Limit must be an integer between 1 and ${MAX_LIMIT}`)
      .toInt(),
  ],
};

// ============================================
// PROGRESS VALIDATION
// ============================================
export const progressValidation = {
  save: [
    requiredString('user_id', 'user_id'),
    requiredString('module_id', 'module_id'),
    body('last_position')
      .optional({ values: 'null' })
      .isInt({ min: 0 })
      .withMessage('last_position must be a non-negative integer')
      .toInt(),
    body('completed')
      .optional({ values: 'null' })
      .isBoolean()
      .withMessage('completed must be a boolean')
      .toBoolean(true),
  ],

  lookup: [requiredQueryString('user_id'), requiredQueryString('module_id')],
};

// ============================================
// NOTE VALIDATION
// ============================================
export const noteValidation = {
  save: [
    requiredString('user_id', 'user_id'),
    requiredString('module_id', 'module_id'),
    optionalString('content', 'content'),
  ],

  lookup: [requiredQueryString('user_id'), requiredQueryString('module_id')],
};

// Runs after a validation chain; turns collected failures into one 422
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const result = validationResult(req);
  if (result.isEmpty()) {
    next();
    return;
  }

  next(
    new ValidationError(
      result.array().map((error) => ({
        field: error.type === 'field' ? error.path : error.type,
        message: String(error.msg),
      }))
    )
  );
};
