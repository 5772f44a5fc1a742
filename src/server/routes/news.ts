/**
 * News item routes: list, get, create, update, delete
 */

import express, { type Router, type Request, type Response } from 'express';
import type { NewsStore } from '../../storage/news-store.js';
import { requireApiKey, type ApiKeyOptions } from '../auth.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { parseId, parseNewsItemInput, toNewsItemResponse } from '../../validation/news-schema.js';
import type { NewsItemInput } from '../../types/index.js';

export interface NewsRouterDeps {
  store: NewsStore;
  auth: ApiKeyOptions;
}

function requireId(req: Request): number {
  const parsed = parseId(req.params);
  if (!parsed.success) {
    throw new ValidationError(parsed.issues);
  }
  return parsed.data;
}

function requirePayload(req: Request): NewsItemInput {
  const parsed = parseNewsItemInput(req.body);
  if (!parsed.success) {
    throw new ValidationError(parsed.issues);
  }
  return parsed.data;
}

export function createNewsRouter({ store, auth }: NewsRouterDeps): Router {
  const router = express.Router();

  // Mutating routes check the key first, then parse the body
  const checkKey = requireApiKey(auth);
  const parseJson = express.json();

  router.get('/', (_req: Request, res: Response) => {
    res.json(store.listAll().map(toNewsItemResponse));
  });

  router.get('/:id', (req: Request, res: Response) => {
    const item = store.getById(requireId(req));
    if (!item) {
      throw new NotFoundError();
    }
    res.json(toNewsItemResponse(item));
  });

  router.post('/', checkKey, parseJson, (req: Request, res: Response) => {
    const created = store.insert(requirePayload(req));
    res.status(201).json(toNewsItemResponse(created));
  });

  router.put('/:id', checkKey, parseJson, (req: Request, res: Response) => {
    const id = requireId(req);
    const updated = store.replace(id, requirePayload(req));
    if (!updated) {
      throw new NotFoundError();
    }
    res.json(toNewsItemResponse(updated));
  });

  router.delete('/:id', checkKey, (req: Request, res: Response) => {
    if (!store.deleteById(requireId(req))) {
      throw new NotFoundError();
    }
    res.status(204).end();
  });

  return router;
}
