#!/usr/bin/env node
/**
 * dashboard-deploy executable
 */

import { main } from '../cli/cli';

void main();
