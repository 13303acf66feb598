#!/usr/bin/env node
import { showStatuses } from "../../libs/status/statuses.js";

/**
 * Solver Status Listing
 * Prints every recognized status key with its description.
 */
showStatuses(process.stdout);
