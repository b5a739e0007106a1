/**
 * NewsRelay — Feed Sources Index
 */

export * from './aggregator';
export * from './portal';
