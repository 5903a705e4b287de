import { serve, type ServerType } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import { cors } from 'hono/cors';
import { loadPresetContacts } from '../config.js';
import type { Store } from '../db/store.js';
import { isRecoverable, MalformedRequestError, NotFoundError } from '../errors.js';
import { logError, logger } from '../logger.js';
import { ContactsManager } from '../managers/contacts.js';
import { FindingsManager } from '../managers/findings.js';
import { MonitorManager } from '../managers/monitor.js';
import { SubjectManager } from '../managers/subjects.js';
import { generateSearchUrls } from '../search.js';
import type { PresetContact } from '../types.js';
import {
  optionalInteger,
  optionalString,
  parseId,
  parseSubjectUpdate,
  readJsonBody,
  requiredString,
  toBoolean,
} from './body.js';
import { loadDashboard } from './dashboard.js';

export interface ServerOptions {
  store: Store;
  /** Reference organizations served at GET /api/contacts */
  presets?: readonly PresetContact[];
  /** Overrides the bundled dashboard document */
  dashboard?: () => string;
  /** Active entries allowed per monitored source type */
  maxActiveMonitors?: number;
}

function found<T>(record: T | null): T {
  if (record === null) {
    throw new NotFoundError();
  }
  return record;
}

export function createServer(options: ServerOptions) {
  const subjects = new SubjectManager(options.store);
  const monitor = new MonitorManager(options.store, options.maxActiveMonitors);
  const findings = new FindingsManager(options.store);
  const contacts = new ContactsManager(options.store, options.presets);
  const dashboard = options.dashboard ?? loadDashboard;

  const app = new Hono();

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
    })
  );

  app.use('*', async (c, next) => {
    await next();
    logger.request(c.req.method, c.req.path, c.res.status);
  });

  app.onError((err, c) => {
    if (isRecoverable(err)) {
      logger.rejected(c.req.path, err.message);
      return c.json({ status: 'error', message: err.message });
    }
    if (err instanceof NotFoundError) {
      return c.json({ error: err.message });
    }
    if (err instanceof MalformedRequestError) {
      return c.json({ error: err.message }, 400);
    }
    logError('http', `${c.req.method} ${c.req.path} failed`, {
      error: err.message,
      stack: err.stack,
    });
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.body(null, 404));

  // Dashboard
  app.get('/', (c) => c.html(dashboard()));
  app.get('/index.html', (c) => c.html(dashboard()));

  app.get('/health', (c) => {
    return c.json({ ok: true, timestamp: new Date().toISOString() });
  });

  // ============================================
  // Subjects
  // ============================================

  app.get('/api/subjects', (c) => {
    return c.json(
      subjects.list({
        status: c.req.query('status'),
        risk_level: c.req.query('risk_level'),
      })
    );
  });

  app.get('/api/subjects/:id', (c) => {
    return c.json(found(subjects.get(parseId(c.req.param('id')))));
  });

  app.post('/api/subjects', async (c) => {
    const body = await readJsonBody(c);
    const name = requiredString(body, 'name_en');
    const id = subjects.add({
      name_en: name,
      name_fa: optionalString(body, 'name_fa'),
      location: optionalString(body, 'location'),
      event: optionalString(body, 'event'),
      notes: optionalString(body, 'notes'),
    });
    return c.json({ status: 'success', id, name });
  });

  app.put('/api/subjects/:id', async (c) => {
    const id = parseId(c.req.param('id'));
    subjects.update(id, parseSubjectUpdate(await readJsonBody(c)));
    return c.json({ status: 'success', id });
  });

  app.delete('/api/subjects/:id', (c) => {
    const id = parseId(c.req.param('id'));
    subjects.delete(id);
    return c.json({ status: 'success', id });
  });

  app.get('/api/stats', (c) => c.json(subjects.statistics()));

  // ============================================
  // Search URL generator
  // ============================================

  app.get('/api/search', (c) => {
    const name = c.req.query('name');
    if (!name) {
      return c.json({ error: 'Name required' }, 400);
    }
    return c.json(generateSearchUrls(name, c.req.query('name_fa')));
  });

  // ============================================
  // Monitor: Twitter accounts
  // ============================================

  app.get('/api/monitor/twitter', (c) => c.json(monitor.listTwitter()));

  app.get('/api/monitor/twitter/:id', (c) => {
    return c.json(found(monitor.getTwitter(parseId(c.req.param('id')))));
  });

  app.post('/api/monitor/twitter', async (c) => {
    const body = await readJsonBody(c);
    const added = monitor.addTwitter(
      requiredString(body, 'username'),
      optionalString(body, 'description')
    );
    return c.json({ status: 'success', ...added });
  });

  app.put('/api/monitor/twitter/:id', async (c) => {
    const id = parseId(c.req.param('id'));
    const body = await readJsonBody(c);
    monitor.setTwitterActive(id, toBoolean(body.is_active, 'is_active'));
    return c.json({ status: 'success', id });
  });

  app.delete('/api/monitor/twitter/:id', (c) => {
    const id = parseId(c.req.param('id'));
    monitor.deleteTwitter(id);
    return c.json({ status: 'success', id });
  });

  // ============================================
  // Monitor: news sources
  // ============================================

  app.get('/api/monitor/news', (c) => c.json(monitor.listNews()));

  app.get('/api/monitor/news/:id', (c) => {
    return c.json(found(monitor.getNews(parseId(c.req.param('id')))));
  });

  app.post('/api/monitor/news', async (c) => {
    const body = await readJsonBody(c);
    const added = monitor.addNews(
      requiredString(body, 'name'),
      requiredString(body, 'url'),
      optionalString(body, 'description')
    );
    return c.json({ status: 'success', ...added });
  });

  app.put('/api/monitor/news/:id', async (c) => {
    const id = parseId(c.req.param('id'));
    const body = await readJsonBody(c);
    monitor.setNewsActive(id, toBoolean(body.is_active, 'is_active'));
    return c.json({ status: 'success', id });
  });

  app.delete('/api/monitor/news/:id', (c) => {
    const id = parseId(c.req.param('id'));
    monitor.deleteNews(id);
    return c.json({ status: 'success', id });
  });

  // ============================================
  // Findings
  // ============================================

  app.get('/api/findings', (c) => {
    const subjectId = c.req.query('subject_id');
    return c.json(
      findings.list({
        finding_type: c.req.query('finding_type'),
        importance: c.req.query('importance'),
        subject_id: subjectId ? parseId(subjectId) : undefined,
      })
    );
  });

  app.get('/api/findings/:id', (c) => {
    return c.json(found(findings.get(parseId(c.req.param('id')))));
  });

  app.post('/api/findings', async (c) => {
    const body = await readJsonBody(c);
    const title = requiredString(body, 'title');
    const id = findings.add({
      title,
      finding_type: optionalString(body, 'finding_type'),
      description: optionalString(body, 'description'),
      source_url: optionalString(body, 'source_url'),
      source_name: optionalString(body, 'source_name'),
      subject_id: optionalInteger(body, 'subject_id'),
      tags: optionalString(body, 'tags'),
      importance: optionalString(body, 'importance'),
      notes: optionalString(body, 'notes'),
    });
    return c.json({ status: 'success', id, title });
  });

  app.put('/api/findings/:id/verify', async (c) => {
    const id = parseId(c.req.param('id'));
    const body = await readJsonBody(c);
    const verified = toBoolean(body.verified, 'verified');
    findings.verify(id, verified);
    return c.json({ status: 'success', id, verified });
  });

  app.delete('/api/findings/:id', (c) => {
    const id = parseId(c.req.param('id'));
    findings.delete(id);
    return c.json({ status: 'success', id });
  });

  // ============================================
  // Contacts
  // ============================================

  app.get('/api/contacts', (c) => c.json(contacts.listPreset()));

  app.get('/api/contacts/user', (c) => c.json(contacts.listUser()));

  app.get('/api/contacts/user/:id', (c) => {
    return c.json(found(contacts.get(parseId(c.req.param('id')))));
  });

  const addContact = async (c: Context) => {
    const body = await readJsonBody(c);
    const name = requiredString(body, 'name');
    const id = contacts.add({
      name,
      contact_type: optionalString(body, 'contact_type'),
      email: optionalString(body, 'email'),
      phone: optionalString(body, 'phone'),
      url: optionalString(body, 'url'),
      description: optionalString(body, 'description'),
      notes: optionalString(body, 'notes'),
    });
    return c.json({ status: 'success', id, name });
  };

  app.post('/api/contacts', addContact);
  app.post('/api/contacts/user', addContact);

  const deleteContact = (id: number) => {
    contacts.delete(id);
    return { status: 'success', id };
  };

  app.delete('/api/contacts/:id', (c) => c.json(deleteContact(parseId(c.req.param('id')))));
  app.delete('/api/contacts/user/:id', (c) => c.json(deleteContact(parseId(c.req.param('id')))));

  // An empty id segment is a malformed id rather than an unknown route
  app.on(
    ['GET', 'PUT', 'DELETE'],
    [
      '/api/subjects/',
      '/api/monitor/twitter/',
      '/api/monitor/news/',
      '/api/findings/',
      '/api/contacts/',
      '/api/contacts/user/',
    ],
    () => {
      throw new MalformedRequestError('Invalid ID');
    }
  );

  return app;
}

export type CasefileApp = ReturnType<typeof createServer>;

export function startServer(store: Store, port: number, hostname = '127.0.0.1'): ServerType {
  const app = createServer({ store, presets: loadPresetContacts() });

  // Bind failures (EADDRINUSE) surface as an 'error' event on the returned server
  return serve({ fetch: app.fetch, port, hostname }, (info) => {
    const url = `http://${hostname === '127.0.0.1' ? 'localhost' : hostname}:${info.port}`;

    console.log(`casefile dashboard: ${url}`);
    console.log('');
    console.log('API:');
    console.log('  GET/POST/PUT/DELETE /api/subjects[/:id]');
    console.log('  GET                 /api/search?name=...&name_fa=...');
    console.log('  GET                 /api/stats');
    console.log('  GET/POST/DELETE     /api/monitor/twitter[/:id], /api/monitor/news[/:id]');
    console.log('  GET/POST/DELETE     /api/findings[/:id], PUT /api/findings/:id/verify');
    console.log('  GET/POST/DELETE     /api/contacts[/user][/:id]');
    console.log('');
    console.log('Press Ctrl+C to stop');

    logger.server('listening', { port: info.port, hostname });
  });
}
