// src/middleware/validation.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { body, param, query, validationResult, ValidationChain } from 'express-validator';
import { ValidationError } from '../utils/errors';

/**
 * Handle validation errors from express-validator
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    return next(new ValidationError(
      errors.array().map(error => ({
        field: error.type === 'field' ? error.path : error.type,
        message: error.msg
      }))
    ));
  }

  next();
};

// Addresses are compared as-is everywhere downstream, so trim and lowercase here only
const emailIn = (field: ValidationChain) =>
  field
    .isString()
    .withMessage('Email is required')
    .bail()
    .trim()
    .isEmail()
    .withMessage('Please provide a valid email')
    .toLowerCase();

export const validateOtpRequest = [
  emailIn(body('email')),
  handleValidationErrors
];

export const validateOtpVerification = [
  emailIn(body('email')),
  body('code')
    .isString()
    .withMessage('Code is required')
    .bail()
    .notEmpty()
    .withMessage('Code is required'),
  handleValidationErrors
];

const requiredText = (field: string, label: string, max = 120) =>
  body(field)
    .isString()
    .withMessage(`${label} is required`)
    .bail()
    .trim()
    .notEmpty()
    .withMessage(`${label} is required`)
    .isLength({ max })
    .withMessage(`${label} cannot exceed ${max} characters`);

/**
 * Profile body. `email`, `is_subscribed` and `is_verified` are not accepted
 * from clients; handlers read only the matched fields below.
 */
export const validateProfile = [
  requiredText('name', 'Name'),
  body('nip')
    .optional({ values: 'null' })
    .isString()
    .withMessage('NIP must be a string')
    .trim()
    .isLength({ max: 30 })
    .withMessage('NIP cannot exceed 30 characters'),
  requiredText('agency', 'Agency'),
  requiredText('position', 'Position'),
  requiredText('grade', 'Grade', 30),
  requiredText('current_region', 'Current region'),
  requiredText('desired_region', 'Desired region'),
  handleValidationErrors
];

export const validateProfileEmailParam = [
  emailIn(param('email')),
  handleValidationErrors
];

/**
 * Validate search query parameters
 */
export const validateSearch = [
  ...['desired_region', 'current_region', 'agency'].map(field =>
    query(field)
      .optional()
      .isString()
      .withMessage(`${field} must be a single value`)
      .trim()
      .isLength({ max: 120 })
      .withMessage(`${field} cannot exceed 120 characters`)
  ),
  handleValidationErrors
];

export const validateMessage = [
  emailIn(body('to_email')),
  body('content')
    .isString()
    .withMessage('Message content is required')
    .bail()
    .trim()
    .notEmpty()
    .withMessage('Message content is required')
    .isLength({ max: 4000 })
    .withMessage('Message cannot exceed 4000 characters'),
  handleValidationErrors
];

export const validateHistoryQuery = [
  emailIn(query('with')),
  handleValidationErrors
];

export const validateAdminVerify = [
  emailIn(body('email')),
  body('verified')
    .isBoolean({ strict: true })
    .withMessage('verified must be true or false')
    .toBoolean(),
  handleValidationErrors
];

export const validateCheckout = [
  emailIn(body('email')),
  handleValidationErrors
];
