#!/usr/bin/env node
import { EXIT_FAILURE, main } from '../index';

main()
    .then(code => process.exit(code))
    .catch(error => {
        console.error('Ingestion failed:', error);
        process.exit(EXIT_FAILURE);
    });
