import { Layout } from './Layout';

export interface ErrorPageProps {
  statusCode: number;
  message: string;
}

export function ErrorPage({ statusCode, message }: ErrorPageProps) {
  return (
    <Layout title={statusCode === 404 ? 'Not found' : 'Something went wrong'}>
      <p className="error" data-status={statusCode}>
        {message}
      </p>
      <p>
        <a href="/">Back to photos</a>
      </p>
    </Layout>
  );
}
