#!/usr/bin/env node
/**
 * XSS Featurizer - feature extraction for XSS page classification
 *
 * Main entry point that delegates to CLI
 */

import './cli/index.js';
