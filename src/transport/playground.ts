/**
 * GraphiQL integration.
 *
 * Serves an interactive page for exploring and testing the API.
 */

export interface PlaygroundConfig {
  /**
   * GraphQL endpoint URL.
   * @default '/graphql'
   */
  readonly endpoint?: string;
}

const DEFAULT_QUERY = `# Explore the API here.
#
# Try listing users:

query {
  users {
    id
    name
    email
  }
}
`;

/**
 * Generates the playground HTML page.
 */
export function generatePlaygroundHTML(config: PlaygroundConfig = {}): string {
  const { endpoint = '/graphql' } = config;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>GraphiQL</title>
  <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/graphiql@3/graphiql.min.css" />
  <style>
    * {
      margin: 0;
      padding: 0;
      box-sizing: border-box;
    }
    html, body, #graphiql {
      height: 100%;
      width: 100%;
    }
  </style>
</head>
<body>
  <div id="graphiql">Loading...</div>

  <script crossorigin src="https://cdn.jsdelivr.net/npm/react@18/umd/react.production.min.js"></script>
  <script crossorigin src="https://cdn.jsdelivr.net/npm/react-dom@18/umd/react-dom.production.min.js"></script>
  <script crossorigin src="https://cdn.jsdelivr.net/npm/graphiql@3/graphiql.min.js"></script>

  <script>
    const fetcher = GraphiQL.createFetcher({ url: ${JSON.stringify(endpoint)} });
    const root = ReactDOM.createRoot(document.getElementById('graphiql'));
    root.render(
      React.createElement(GraphiQL, {
        fetcher: fetcher,
        defaultQuery: ${JSON.stringify(DEFAULT_QUERY)},
        defaultEditorToolsVisibility: true,
      })
    );
  </script>
</body>
</html>`;
}

/**
 * Checks if a request accepts HTML (for playground).
 */
export function acceptsHTML(headers: Headers): boolean {
  const accept = headers.get('Accept') || '';
  return accept.includes('text/html');
}
