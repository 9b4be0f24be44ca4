import { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { z } from 'zod';

import { requestScope } from '../middleware';

const customersQuerySchema = z.object({
  country: z.string().trim().min(1)
});

const addCustomerSchema = z.object({
  customerId: z.string().trim().min(1).max(10),
  companyName: z.string().trim().min(1),
  country: z.string().trim().min(1).nullable().default(null)
});

/**
 * Forwards rejections of an async handler to the error middleware
 */
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function customersRouter(): Router {
  const router = Router();

  router.get(
    '/customers',
    asyncHandler(async (req, res) => {
      const { country } = customersQuerySchema.parse(req.query);
      const customers = await requestScope(req).customers.getCustomers(country);
      if (customers.length > 0) {
        res.status(200).json(customers);
        return;
      }
      res.status(204).end();
    })
  );

  router.get(
    '/customers/:customerId',
    asyncHandler(async (req, res) => {
      const customer = await requestScope(req).customers.getCustomer(req.params.customerId);
      res.status(200).json(customer);
    })
  );

  router.post(
    '/customers',
    asyncHandler(async (req, res) => {
      const { customerId, companyName, country } = addCustomerSchema.parse(req.body);
      const scope = requestScope(req);
      await scope.customers.save({ customerId, companyName }, country);
      // commit before reporting the customer as created
      await scope.dispose();
      res.status(201).json({ customerId, companyName });
    })
  );

  return router;
}
