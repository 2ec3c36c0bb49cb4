import type { FallbackProps } from 'react-error-boundary';

export function CrashFallback({ error, resetErrorBoundary }: FallbackProps) {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return (
    <div
      role="alert"
      style={{
        width: '100vw',
        height: '100vh',
        backgroundColor: '#111827',
        display: 'flex',
        alignItems: 'center',
        justifyContent: 'center',
        padding: '2rem',
        overflow: 'auto',
      }}
    >
      <div style={{ maxWidth: '42rem', textAlign: 'center' }}>
        <h1
          style={{
            fontSize: '1.5rem',
            fontWeight: 700,
            color: '#f87171',
            marginBottom: '1rem',
          }}
        >
          Something went wrong
        </h1>
        <p style={{ color: '#d1d5db', marginBottom: '1rem' }}>{message}</p>
        {stack && (
          <pre
            style={{
              textAlign: 'left',
              fontSize: '0.75rem',
              color: '#9ca3af',
              backgroundColor: '#1f2937',
              padding: '1rem',
              borderRadius: '0.5rem',
              marginBottom: '1rem',
              overflow: 'auto',
              maxHeight: '16rem',
            }}
          >
            {stack}
          </pre>
        )}
        <div style={{ display: 'flex', gap: '0.75rem', justifyContent: 'center' }}>
          <button
            type="button"
            onClick={resetErrorBoundary}
            style={{
              padding: '0.5rem 1rem',
              backgroundColor: '#374151',
              color: 'white',
              borderRadius: '0.5rem',
              border: 'none',
              cursor: 'pointer',
            }}
          >
            Try Again
          </button>
          <button
            type="button"
            onClick={() => window.location.reload()}
            style={{
              padding: '0.5rem 1rem',
              backgroundColor: '#2563eb',
              color: 'white',
              borderRadius: '0.5rem',
              border: 'none',
              cursor: 'pointer',
            }}
          >
            Reload Page
          </button>
        </div>
      </div>
    </div>
  );
}
