/**
 * Architecture Overview
 * =====================
 * This file documents the architecture of the docrelay services.
 * It does not contain executable code, but serves as in-repo technical documentation.
 * Diagrams are written in Mermaid syntax for visualization.
 */

/**
 * 1. Write Flow
 * -------------
 * ```mermaid
 * sequenceDiagram
 *     participant Client
 *     participant HTTP as HTTP service
 *     participant GW as StoreGateway
 *     participant Store as MongoDB
 *
 *     Client->>HTTP: PUT /api/v1/resources/cart-42
 *     HTTP->>GW: write(resource, document, expectedRevision?)
 *     GW->>Store: bump revision (documents)
 *     GW->>Store: next sequence (counters), append CommitRecord (changes)
 *     Store-->>GW: CommitRecord
 *     GW-->>HTTP: WriteResult { revision, committedAt }
 *     HTTP-->>Client: 200
 * ```
 */

/**
 * 2. Delivery Flow
 * ----------------
 * ```mermaid
 * graph LR
 *     S[(changes collection)] -->|poll or change stream| F[ChangeFeed]
 *     F --> N[ChangeNotifier]
 *     N -->|per-resource channel| C1[ChangeSubscription]
 *     N -->|per-resource channel| C2[ChangeSubscription]
 *     C1 -->|pump| SE1[Session A]
 *     C2 -->|pump| SE2[Session B]
 *     SE1 -->|event frame| W1[WebSocket]
 *     SE2 -->|event frame| W2[WebSocket]
 * ```
 *
 * The two services never talk to each other. The socket service learns about writes
 * only from the change log.
 */

/**
 * 3. Session Lifecycle
 * --------------------
 * ```mermaid
 * stateDiagram-v2
 *     [*] --> connecting
 *     connecting --> active: hello
 *     connecting --> closing: no hello (4002)
 *     active --> closing: client close / idle (4000) / overflow (4001) / protocol (4003) / send failure (1011)
 *     closing --> closed: flush done or flush timeout
 *     closed --> [*]
 * ```
 */

/**
 * 4. Ordering
 * -----------
 * - The store assigns revisions per resource and sequences across the log.
 * - The notifier keeps a per-resource watermark and holds early revisions for the
 *   reorder window.
 * - Each session keeps its own last-delivered revision per resource, so a snapshot and
 *   a live event for the same revision are sent once.
 */

/**
 * 5. Benefits vs Limitations
 * ---------------------------
 * ✅ Benefits:
 * - Either service restarts without the other noticing
 * - Slow sockets only hurt themselves
 *
 * ⚠️ Limitations:
 * - Polling adds up to one poll interval of latency
 * - Subscribers see the latest document, not every intermediate revision, after a reconnect
 */

export {};
