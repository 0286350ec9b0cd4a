import { Request, Response } from 'express';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../utils/pagination';

const API_INFO = {
  api_name: 'Newsroom API',
  version: '1.0',
  description: 'REST API for articles and newsletters from publishers and journalists',
  endpoints: {
    auth: {
      register: '/api/auth/register',
      login: '/api/auth/login',
      token: '/api/auth/token',
      me: '/api/auth/me',
      password_reset: '/api/auth/password-reset',
      forgot_username: '/api/auth/forgot-username'
    },
    articles: {
      list: '/api/articles',
      detail: '/api/articles/{id}',
      approve: '/api/articles/{id}/approve',
      reject: '/api/articles/{id}/reject',
      image: '/api/articles/{id}/image'
    },
    newsletters: {
      list: '/api/newsletters',
      detail: '/api/newsletters/{id}',
      approve: '/api/newsletters/{id}/approve',
      reject: '/api/newsletters/{id}/reject',
      image: '/api/newsletters/{id}/image'
    },
    publishers: {
      list: '/api/publishers',
      detail: '/api/publishers/{id}'
    },
    journalists: {
      list: '/api/journalists',
      detail: '/api/journalists/{id}'
    },
    subscriptions: { manage: '/api/subscriptions' },
    feed: { combined: '/api/feed' },
    browse: { approved: '/api/browse' },
    social: { connection: '/api/social/connection' }
  },
  authentication: {
    methods: ['Bearer'],
    token_endpoint: '/api/auth/token'
  },
  formats: ['JSON'],
  pagination: `Page-based (${DEFAULT_PAGE_SIZE} items per page, page_size up to ${MAX_PAGE_SIZE})`
};

export const getInfo = (req: Request, res: Response) => {
  res.json(API_INFO);
};
