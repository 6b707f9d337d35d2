import debug from 'debug';

// Enable with DEBUG=validator-manager:*
export const log = {
    claims: debug('validator-manager:claims'),
    disputes: debug('validator-manager:disputes'),
    epochs: debug('validator-manager:epochs'),
    events: debug('validator-manager:events'),
    indexer: debug('validator-manager:indexer'),
};
