/**
 * Express Request augmentation for authenticated callers.
 */

declare global {
  namespace Express {
    interface Request {
      user?: {
        id: string;
        email: string;
      };
    }
  }
}

export {};
