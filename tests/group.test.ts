import { describe, it, expect, vi } from 'vitest';
import { App } from '../src/app';
import { RouterSetupError } from '../src/errors';
import type { GroupInfo, Handler, Middleware } from '../src/types';
import { routeSummary } from './helpers';

const handler: Handler = (_req, res) => res.send('ok');
const mw: Middleware = (_req, _res, next) => next();

describe('Group nesting', () => {
  it('composes nested prefixes', () => {
    const app = new App();
    const v1 = app.group('/api').group('/v1');

    expect(v1.prefix).toBe('/api/v1');
    expect(v1.getPrefix()).toBe('/api/v1');
  });

  it('shares the app and points at its parent', () => {
    const app = new App();
    const api = app.group('/api');
    const v1 = api.group('v1/');

    expect(v1.app).toBe(app);
    expect(v1.parent).toBe(api);
    expect(api.parent).toBeUndefined();
  });

  it('registers group handlers as middleware owned by the parent', () => {
    const app = new App();
    const api = app.group('/api');
    const register = vi.spyOn(app, 'register');

    const admin = api.group('/admin', mw);

    expect(register).toHaveBeenCalledTimes(1);
    expect(register).toHaveBeenCalledWith(['USE'], '/api/admin', api, undefined, mw);
    expect(admin.prefix).toBe('/api/admin');
    expect(api.hasRoutes()).toBe(false);
  });

  it('hands a snapshot of each new group to onGroup hooks', () => {
    const app = new App();
    const seen: GroupInfo[] = [];
    app.hooks.onGroup((group) => seen.push(group));

    app.group('/api').group('/v1');

    expect(seen).toEqual([
      { name: '', prefix: '/api' },
      { name: '', prefix: '/api/v1' },
    ]);
    expect(Object.isFrozen(seen[0])).toBe(true);
  });

  it('throws when an onGroup hook rejects, after registering the handlers', () => {
    const app = new App();
    app.hooks.onGroup(() => {
      throw new Error('no groups here');
    });

    expect(() => app.group('/x', mw)).toThrow(RouterSetupError);
    expect(() => app.group('/y')).toThrow('onGroup hook failed: no groups here');
    expect(routeSummary(app.getRoutes())).toEqual(['USE /x']);
  });
});

describe('Group verbs', () => {
  it('registers composed paths with the group as owner', () => {
    const app = new App();
    const api = app.group('/api');
    const register = vi.spyOn(app, 'register');

    const returned = api.get('/users', handler, mw);

    expect(returned).toBe(api);
    expect(register).toHaveBeenCalledWith(['GET'], '/api/users', api, handler, mw);
    const [route] = app.getRoutes();
    expect(route.group).toBe(api);
    expect(route.handlers).toEqual([mw, handler]);
  });

  it('maps every verb to its method', () => {
    const app = new App();
    const api = app.group('/api');
    const verbs = [
      ['get', 'GET'],
      ['head', 'HEAD'],
      ['post', 'POST'],
      ['put', 'PUT'],
      ['delete', 'DELETE'],
      ['connect', 'CONNECT'],
      ['options', 'OPTIONS'],
      ['trace', 'TRACE'],
      ['patch', 'PATCH'],
    ] as const;

    for (const [verb, method] of verbs) {
      api[verb]('/thing', handler);
      expect(app.getRoutes().at(-1)?.method).toBe(method);
    }
    expect(app.getRoutes()).toHaveLength(9);
  });

  it('uses the group prefix itself for an empty path', () => {
    const app = new App();
    app.group('/api').post('', handler);

    expect(routeSummary(app.getRoutes())).toEqual(['POST /api']);
  });

  it('reads the configured methods when all() is called', () => {
    const app = new App({ requestMethods: ['GET', 'POST'] });
    const api = app.group('/api');

    api.all('/a', handler);
    app.configure({ requestMethods: ['GET', 'PUT', 'PATCH'] });
    api.all('/b', handler);

    expect(routeSummary(app.getRoutes())).toEqual([
      'GET /api/a',
      'POST /api/a',
      'GET /api/b',
      'PUT /api/b',
      'PATCH /api/b',
    ]);
  });

  it('rejects methods the app is not configured for', () => {
    const app = new App({ requestMethods: ['GET'] });
    const api = app.group('/api');

    expect(() => api.add(['BREW'], '/pot', handler)).toThrow('add: invalid http method BREW');
    expect(() => api.post('/pot', handler)).toThrow(RouterSetupError);
    expect(app.getRoutes()).toHaveLength(0);
  });

  it('registers static files below the group prefix', () => {
    const app = new App();
    const api = app.group('/api');
    const registerStatic = vi.spyOn(app, 'registerStatic');

    api.static('/assets', '/srv/public');

    expect(registerStatic).toHaveBeenCalledWith('/api/assets', '/srv/public', undefined);
    expect(routeSummary(app.getRoutes())).toEqual([
      'GET /api/assets',
      'HEAD /api/assets',
      'GET /api/assets/*',
      'HEAD /api/assets/*',
    ]);
    expect(api.hasRoutes()).toBe(true);
  });
});

describe('anyRouteDefined', () => {
  it('is set only on the group the verb was called on', () => {
    const app = new App();
    const api = app.group('/api');
    const v1 = api.group('/v1');

    v1.get('/users', handler);
    expect(v1.hasRoutes()).toBe(true);
    expect(api.hasRoutes()).toBe(false);

    api.get('/health', handler);
    const v2 = api.group('/v2');
    expect(api.hasRoutes()).toBe(true);
    expect(v2.hasRoutes()).toBe(false);
  });

  it('stays set whatever comes next', () => {
    const app = new App();
    const api = app.group('/api');

    api.get('/users', handler);
    api.name('users');
    api.use(mw);
    api.group('/nested');
    api.route('/x');
    api.static('/files', '/srv');

    expect(api.hasRoutes()).toBe(true);
  });
});

describe('Group.name', () => {
  it('names the group when nothing is registered on it yet', () => {
    const app = new App();
    const seen: GroupInfo[] = [];
    app.hooks.onGroupName((group) => seen.push(group));
    const appName = vi.spyOn(app, 'name');

    const api = app.group('/api').name('api.');

    expect(api.getName()).toBe('api.');
    expect(seen).toEqual([{ name: 'api.', prefix: '/api' }]);
    expect(appName).not.toHaveBeenCalled();
  });

  it('names the latest route once the group has one', () => {
    const app = new App();
    const groupNames = vi.fn();
    app.hooks.onGroupName(groupNames);
    const appName = vi.spyOn(app, 'name');

    const users = app.group('/users');
    users.get('/', handler).name('list');

    expect(appName).toHaveBeenCalledWith('list');
    expect(groupNames).not.toHaveBeenCalled();
    expect(users.getName()).toBe('');
    expect(app.getRoute('list')?.path).toBe('/users');
  });

  it('puts the group name in front of route names', () => {
    const app = new App();
    const users = app.group('/users').name('user.');
    users.get('/:id', handler).name('show');

    expect(app.getRoute('user.show')?.path).toBe('/users/:id');
    expect(users.getName()).toBe('user.');
  });

  it('appends to the parent name without a separator', () => {
    const app = new App();
    const user = app.group('/users').name('user.');
    const list = user.group('/list').name('list');
    const plain = app.group('/plain').group('/child').name('child');

    expect(list.getName()).toBe('user.list');
    expect(plain.getName()).toBe('child');
  });

  it('keeps the name and releases the lock when the hook rejects', () => {
    const app = new App();
    app.hooks.onGroupName((group) => {
      if (group.name === 'bad') throw new Error('reserved');
    });

    const bad = app.group('/bad');
    expect(() => bad.name('bad')).toThrow('onGroupName hook failed: reserved');
    expect(bad.getName()).toBe('bad');

    const good = app.group('/good').name('good');
    expect(good.getName()).toBe('good');
  });

  it('does not let group naming nest inside another', () => {
    const app = new App();
    const other = app.group('/other');
    const events: string[] = [];
    app.hooks.onGroupName((group) => {
      events.push(`enter ${group.name}`);
      if (group.name === 'outer') other.name('inner');
      events.push(`exit ${group.name}`);
    });

    expect(() => app.group('/outer').name('outer')).toThrow(/app lock is already held/);
    expect(events).toEqual(['enter outer']);

    app.group('/a').name('a');
    app.group('/b').name('b');
    expect(events).toEqual(['enter outer', 'enter a', 'exit a', 'enter b', 'exit b']);
  });
});

describe('Group.route', () => {
  it('binds a builder to the composed path without registering', () => {
    const app = new App();
    const api = app.group('/api');
    const register = vi.spyOn(app, 'register');

    const items = api.route('/items/:id');

    expect(items.path).toBe('/api/items/:id');
    expect(register).not.toHaveBeenCalled();
    expect(api.hasRoutes()).toBe(false);
  });

  it('registers several methods and nested paths on the builder', () => {
    const app = new App();
    const items = app.group('/api').route('/items/:id');

    items.get(handler).put(handler, mw).name('item');
    items.route('/tags').delete(handler);

    expect(routeSummary(app.getRoutes())).toEqual([
      'GET /api/items/:id',
      'PUT /api/items/:id',
      'DELETE /api/items/:id/tags',
    ]);
    expect(app.getRoute('item')?.method).toBe('PUT');
    expect(app.getRoutes()[1].handlers).toEqual([mw, handler]);
    expect(app.getRoutes()[0].group).toBeUndefined();
  });

  it('registers every configured method with all()', () => {
    const app = new App({ requestMethods: ['GET', 'DELETE'] });
    app.route('/items').all(handler);

    expect(routeSummary(app.getRoutes())).toEqual(['GET /items', 'DELETE /items']);
  });
});
