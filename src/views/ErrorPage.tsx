import { Layout } from './Layout.js';

interface ErrorPageProps {
  title: string;
  message: string;
}

export function ErrorPage({ title, message }: ErrorPageProps) {
  return (
    <Layout title={title}>
      <div className="card status-error">
        <h1>{title}</h1>
        <p>{message}</p>
      </div>
      <p>
        <a href="/">Back to the planner</a>
      </p>
    </Layout>
  );
}
