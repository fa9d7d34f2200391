/**
 * Single Jest entry point.
 *
 * tree-sitter patches its native classes the first time it is required in a
 * process. Jest gives every test file a fresh module registry, and a second
 * copy of tree-sitter in the same worker leaves `Tree.rootNode` undefined, so
 * all suites load through this one file.
 */

import "./parser.suite";
import "./structure.suite";
import "./catalog.suite";
import "./config.suite";
import "./checker.suite";
import "./handler.suite";
import "./cli.suite";
