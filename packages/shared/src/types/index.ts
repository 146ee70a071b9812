// ============================================
// Monitoring Types
// ============================================

export * from './monitoring';
