import * as admin from 'firebase-admin';
import type { Firestore } from 'firebase-admin/firestore';

/**
 * Initializes the default app on first use. Callers hold on to the returned
 * instance; nothing here runs at import time.
 */
export function getFirestore(projectId?: string): Firestore {
  if (!admin.apps.length) {
    admin.initializeApp(projectId ? { projectId } : undefined);
  }
  return admin.firestore();
}
