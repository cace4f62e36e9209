// ===============================================
// FIREBASE BACKEND INITIALIZATION
// ===============================================

import { initializeApp, type FirebaseOptions } from 'firebase/app';
import { enableNetwork, getFirestore } from 'firebase/firestore';
import type { RemoteBackend } from './bootstrap';
import { rootLogger } from './logger';

const logger = rootLogger.getLogger('firebase');

// Initializes the Firebase app and brings Firestore's network layer up
export const firebaseBackend: RemoteBackend = {
  async initialize(options: FirebaseOptions) {
    try {
      const app = initializeApp(options);
      logger.debug(`Firebase app "${app.name}" created for project ${options.projectId}`);

      await enableNetwork(getFirestore(app));
      logger.info('Firebase initialized successfully');
    } catch (error) {
      logger.error('Failed to initialize Firebase:', error);
      throw error;
    }
  }
};

export default firebaseBackend;
