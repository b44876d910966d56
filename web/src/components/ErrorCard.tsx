export function ErrorCard({ message }: { message: string }) {
  return (
    <div className="card error-card" role="alert">
      <div className="card-header">
        <h5>Error</h5>
      </div>
      <div className="card-body">
        <p>{`An error occurred while analyzing: ${message}`}</p>
      </div>
    </div>
  );
}
