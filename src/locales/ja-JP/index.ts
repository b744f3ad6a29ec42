import errors from './errors.json';
import history from './history.json';

export default {
  errors,
  history,
};
