export const DEFAULT_CONFIG_FILE = 'sitemap-tree.yaml';

export const DEFAULT_CONFIG_TEMPLATE = `# sitemap-tree configuration
# Values in this file override the built-in defaults. SITEMAP_TREE_* environment
# variables override this file, and command line flags override both.

# Transport used to fetch sitemaps: axios or undici
client: axios

# Request timeout in seconds
timeout: 60

# Seconds to wait between requests; randomWait varies each wait between 0.5x and 1.5x
wait: 0
randomWait: false

# HTTP(s) proxy for every request
# proxy: http://localhost:3128

# Child sitemaps of one index sitemap fetched at once
concurrency: 1

# Where to look for sitemaps besides the URLs listed in robots.txt
useRobots: true
useKnownPaths: true
extraKnownPaths: []
#  - custom/sitemap.xml

# Child sitemaps whose URL path matches one of these globs are not fetched
exclude: []
#  - "/archive/**"

# Output: tabtree, pages or json
format: tabtree
stripUrl: false

# debug, info, warn, error or silent
logLevel: warn
`;
