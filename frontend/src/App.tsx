// frontend/src/App.tsx
import type { FC } from 'react';
import UserManagementPage from './components/UserManagementPage';

const App: FC = () => {
  return (
    <div className="App">
      <main>
        <UserManagementPage />
      </main>
    </div>
  );
};

export default App;
