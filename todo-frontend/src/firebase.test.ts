import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  initializeApp: vi.fn(),
  getFirestore: vi.fn(),
  enableNetwork: vi.fn()
}));

vi.mock('firebase/app', () => ({ initializeApp: mocks.initializeApp }));
vi.mock('firebase/firestore', () => ({
  getFirestore: mocks.getFirestore,
  enableNetwork: mocks.enableNetwork
}));

import { firebaseBackend } from './firebase';

const options = { apiKey: 'test-api-key', projectId: 'todo-test', appId: 'test-app-id' };

describe('firebaseBackend', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mocks.initializeApp.mockReturnValue({ name: '[DEFAULT]' });
    mocks.getFirestore.mockReturnValue({ type: 'firestore' });
    mocks.enableNetwork.mockResolvedValue(undefined);
  });

  it('creates the app and enables the Firestore network', async () => {
    await firebaseBackend.initialize(options);

    expect(mocks.initializeApp).toHaveBeenCalledWith(options);
    expect(mocks.getFirestore).toHaveBeenCalledWith({ name: '[DEFAULT]' });
    expect(mocks.enableNetwork).toHaveBeenCalledWith({ type: 'firestore' });
  });

  it('rethrows initialization failures', async () => {
    mocks.enableNetwork.mockRejectedValue(new Error('unavailable'));
    await expect(firebaseBackend.initialize(options)).rejects.toThrow('unavailable');
  });

  it('rethrows invalid options errors from the SDK', async () => {
    mocks.initializeApp.mockImplementation(() => {
      throw new Error('invalid-app-argument');
    });
    await expect(firebaseBackend.initialize(options)).rejects.toThrow('invalid-app-argument');
    expect(mocks.enableNetwork).not.toHaveBeenCalled();
  });
});
